/**
 * Alignment Comparator
 *
 * Per-field distance between candidate and reference detections is the pass
 * criterion. The whole-image pixel ratio is a secondary diagnostic and is
 * never folded into the per-field threshold.
 */

import {
  DetectedPosition,
  FieldDifference,
  FieldMeasurement,
  FieldSpec,
  NOT_DETECTED,
  RasterImage,
} from './types';

export const UNDETECTED_DIFFERENCE: FieldDifference = Object.freeze({
  dy: Number.POSITIVE_INFINITY,
  dx: Number.POSITIVE_INFINITY,
  distance: Number.POSITIVE_INFINITY,
});

// Largest per-channel delta that still counts as "the same pixel"
export const DEFAULT_PIXEL_TOLERANCE = 1;

export interface FieldComparison {
  fields: Record<string, FieldMeasurement>;
  maxDifference: number;
  allFieldsDetected: boolean;
  passed: boolean;
}

export interface ImageDifference {
  differentPixelRatio: number;
  maxChannelDifference: number;
  sizeMismatch: boolean;
}

export function compare(a: DetectedPosition, b: DetectedPosition): FieldDifference {
  if (!a.found || !b.found) {
    return UNDETECTED_DIFFERENCE;
  }

  const dy = Math.abs(a.centerY - b.centerY);
  const dx = Math.abs(a.centerX - b.centerX);
  return { dy, dx, distance: Math.sqrt(dy * dy + dx * dx) };
}

/**
 * Measure every field. `maxDifference` and `allFieldsDetected` only consider
 * required fields; optional ones are reported for diagnostics.
 */
export function measureFields(
  candidate: Record<string, DetectedPosition>,
  reference: Record<string, DetectedPosition>,
  specs: readonly FieldSpec[],
  tolerancePx: number
): FieldComparison {
  const fields: Record<string, FieldMeasurement> = {};
  let maxDifference = 0;
  let allFieldsDetected = true;

  for (const spec of specs) {
    const candidatePosition = candidate[spec.name] ?? NOT_DETECTED;
    const referencePosition = reference[spec.name] ?? NOT_DETECTED;
    const difference = compare(candidatePosition, referencePosition);

    fields[spec.name] = {
      candidate: candidatePosition,
      reference: referencePosition,
      difference,
      withinTolerance: Number.isFinite(difference.distance) && difference.distance <= tolerancePx,
      required: spec.required,
    };

    if (!spec.required) {
      continue;
    }
    if (!Number.isFinite(difference.distance)) {
      allFieldsDetected = false;
    }
    maxDifference = Math.max(maxDifference, difference.distance);
  }

  return {
    fields,
    maxDifference,
    allFieldsDetected,
    passed: allFieldsDetected && maxDifference <= tolerancePx,
  };
}

export function imageDifference(
  a: RasterImage,
  b: RasterImage,
  pixelTolerance: number = DEFAULT_PIXEL_TOLERANCE
): ImageDifference {
  if (a.width !== b.width || a.height !== b.height || a.channels !== b.channels) {
    return { differentPixelRatio: 1, maxChannelDifference: 255, sizeMismatch: true };
  }

  const pixelCount = a.width * a.height;
  if (pixelCount === 0) {
    return { differentPixelRatio: 0, maxChannelDifference: 0, sizeMismatch: false };
  }

  let different = 0;
  let maxChannelDifference = 0;

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    const offset = pixel * a.channels;
    let pixelDifference = 0;
    for (let channel = 0; channel < a.channels; channel++) {
      const delta = Math.abs(a.data[offset + channel] - b.data[offset + channel]);
      if (delta > pixelDifference) {
        pixelDifference = delta;
      }
    }
    if (pixelDifference > maxChannelDifference) {
      maxChannelDifference = pixelDifference;
    }
    if (pixelDifference > pixelTolerance) {
      different++;
    }
  }

  return { differentPixelRatio: different / pixelCount, maxChannelDifference, sizeMismatch: false };
}
