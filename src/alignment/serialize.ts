import {
  DetectedPosition,
  FieldDifference,
  FieldMeasurement,
  VerificationAttempt,
  VerificationResult,
} from './types';

// JSON has no Infinity; undetected distances travel as null beside `detected`

export interface SerializedDifference {
  detected: boolean;
  dy: number | null;
  dx: number | null;
  distance: number | null;
}

export interface SerializedMeasurement {
  candidate: DetectedPosition;
  reference: DetectedPosition;
  difference: SerializedDifference;
  withinTolerance: boolean;
  required: boolean;
}

export type SerializedAttempt = Omit<VerificationAttempt, 'fields' | 'maxDifference'> & {
  fields: Record<string, SerializedMeasurement>;
  maxDifference: number | null;
};

export type SerializedResult = Omit<VerificationResult, 'attempts' | 'cacheProbe'> & {
  attempts: SerializedAttempt[];
  cacheProbe?: SerializedAttempt;
};

function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

export function serializeDifference(difference: FieldDifference): SerializedDifference {
  return {
    detected: Number.isFinite(difference.distance),
    dy: finiteOrNull(difference.dy),
    dx: finiteOrNull(difference.dx),
    distance: finiteOrNull(difference.distance),
  };
}

function serializeMeasurement(measurement: FieldMeasurement): SerializedMeasurement {
  return {
    candidate: measurement.candidate,
    reference: measurement.reference,
    difference: serializeDifference(measurement.difference),
    withinTolerance: measurement.withinTolerance,
    required: measurement.required,
  };
}

export function serializeAttempt(attempt: VerificationAttempt): SerializedAttempt {
  const fields: Record<string, SerializedMeasurement> = {};
  for (const [name, measurement] of Object.entries(attempt.fields)) {
    fields[name] = serializeMeasurement(measurement);
  }
  return { ...attempt, fields, maxDifference: finiteOrNull(attempt.maxDifference) };
}

export function serializeResult(result: VerificationResult): SerializedResult {
  const { cacheProbe, attempts, ...rest } = result;
  const serialized: SerializedResult = { ...rest, attempts: attempts.map(serializeAttempt) };
  if (cacheProbe) {
    serialized.cacheProbe = serializeAttempt(cacheProbe);
  }
  return serialized;
}
