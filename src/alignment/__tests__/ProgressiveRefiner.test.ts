import { compare } from '../AlignmentComparator';
import { ProgressiveRefiner } from '../ProgressiveRefiner';
import { DetectedPosition, FieldMeasurement, NOT_DETECTED, RenderParameters, VerificationAttempt } from '../types';

function at(centerX: number, centerY: number): DetectedPosition {
  return { found: true, centerX, centerY, bounds: { top: centerY, bottom: centerY, left: centerX, right: centerX } };
}

// Candidate displaced from a reference at (100, 100) by the given error, or undetected for null
function attempt(
  attemptNumber: number,
  errors: Record<string, { x: number; y: number } | null>,
  renderParameters: RenderParameters = { offsets: {} },
  maxDifference = 0
): VerificationAttempt {
  const fields: Record<string, FieldMeasurement> = {};
  for (const [name, error] of Object.entries(errors)) {
    const candidate = error ? at(100 + error.x, 100 + error.y) : NOT_DETECTED;
    const reference = at(100, 100);
    const difference = compare(candidate, reference);
    fields[name] = { candidate, reference, difference, withinTolerance: difference.distance <= 1, required: true };
  }
  return {
    attemptNumber,
    source: 'refinement',
    renderParameters,
    fields,
    maxDifference,
    allFieldsDetected: Object.values(errors).every((error) => error !== null),
    passed: false,
    durationMs: 1,
  };
}

function withDifferences(values: number[]): VerificationAttempt[] {
  return values.map((value, index) => attempt(index + 1, {}, { offsets: {} }, value));
}

describe('ProgressiveRefiner', () => {
  const refiner = new ProgressiveRefiner();

  describe('stepSize', () => {
    test('halves every decay interval', () => {
      expect(refiner.stepSize(1)).toBe(1);
      expect(refiner.stepSize(3)).toBe(1);
      expect(refiner.stepSize(4)).toBe(0.5);
      expect(refiner.stepSize(7)).toBe(0.25);
    });

    test('follows custom options', () => {
      const custom = new ProgressiveRefiner({ initialStep: 2, stepDecay: 0.25, decayInterval: 1 });
      expect(custom.stepSize(1)).toBe(2);
      expect(custom.stepSize(2)).toBe(0.5);
    });
  });

  describe('nextParameters', () => {
    test('moves each field against its signed error', () => {
      const previous = attempt(1, { name: { x: 2, y: -3 } });
      const next = refiner.nextParameters(previous, [previous]);
      expect(next.offsets.name).toEqual({ dx: -2, dy: 3 });
    });

    test('keeps the offsets of undetected fields', () => {
      const previous = attempt(1, { name: { x: 0, y: 1 }, event: null }, { offsets: { event: { dx: 1, dy: 1 } } });
      const next = refiner.nextParameters(previous, [previous]);

      expect(next.offsets.event).toEqual({ dx: 1, dy: 1 });
      expect(next.offsets.name).toEqual({ dx: 0, dy: -1 });
    });

    test('applies the decayed step on later attempts', () => {
      const previous = attempt(4, { name: { x: 0, y: 2 } }, { offsets: { name: { dx: 0, dy: -1 } } });
      const next = refiner.nextParameters(previous, [previous]);
      expect(next.offsets.name).toEqual({ dx: 0, dy: -2 });
    });

    test('halves the step on an axis whose error changed sign', () => {
      const first = attempt(1, { name: { x: 0, y: 2 } });
      const second = attempt(2, { name: { x: 0, y: -2 } }, { offsets: { name: { dx: 0, dy: -2 } } });
      const next = refiner.nextParameters(second, [first, second]);
      expect(next.offsets.name).toEqual({ dx: 0, dy: -1 });
    });

    test('leaves the previous attempt untouched', () => {
      const previous = attempt(1, { name: { x: 1, y: 1 } }, { offsets: { name: { dx: 5, dy: 5 } } });
      refiner.nextParameters(previous, [previous]);
      expect(previous.renderParameters.offsets.name).toEqual({ dx: 5, dy: 5 });
    });
  });

  describe('undetectedFields', () => {
    test('lists fields missing from the candidate', () => {
      const failed = attempt(1, { name: { x: 0, y: 0 }, event: null });
      expect(refiner.undetectedFields(failed)).toEqual(['event']);
      expect(refiner.undetectedFields(failed, new Set(['name']))).toEqual([]);
    });
  });

  describe('shouldAbort', () => {
    test('waits for a full window', () => {
      expect(refiner.shouldAbort(withDifferences([5, 5]))).toBe(false);
    });

    test('keeps going while differences improve', () => {
      expect(refiner.shouldAbort(withDifferences([5, 4, 3]))).toBe(false);
      expect(refiner.shouldAbort(withDifferences([4, 4, 3]))).toBe(false);
    });

    test('aborts when the trailing window is non-decreasing', () => {
      expect(refiner.shouldAbort(withDifferences([3, 3, 3]))).toBe(true);
      expect(refiner.shouldAbort(withDifferences([3, 4, 5]))).toBe(true);
      expect(refiner.shouldAbort(withDifferences([9, 2, 4, 4, 4]))).toBe(true);
    });
  });

  test('rejects invalid options', () => {
    expect(() => new ProgressiveRefiner({ convergenceWindow: 1 })).toThrow(RangeError);
    expect(() => new ProgressiveRefiner({ stepDecay: 0 })).toThrow(RangeError);
    expect(() => new ProgressiveRefiner({ decayInterval: 0 })).toThrow(RangeError);
  });
});
