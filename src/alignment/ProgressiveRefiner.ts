/**
 * Progressive Refiner
 *
 * Turns the signed position error of a failed attempt into the render
 * offsets for the next one, with a geometrically decaying step, and decides
 * when the loop has stopped improving.
 */

import { createLogger } from '../utils/logger';
import { DEFAULT_CONVERGENCE_WINDOW, FieldMeasurement, FieldOffset, RenderParameters, VerificationAttempt } from './types';

const logger = createLogger('progressive-refiner');

export interface RefinerOptions {
  convergenceWindow: number;
  initialStep: number;
  stepDecay: number;
  decayInterval: number;
}

export const DEFAULT_REFINER_OPTIONS: RefinerOptions = {
  convergenceWindow: DEFAULT_CONVERGENCE_WINDOW,
  initialStep: 1,
  stepDecay: 0.5,
  decayInterval: 3,
};

interface SignedError {
  x: number;
  y: number;
}

function signedError(measurement: FieldMeasurement | undefined): SignedError | null {
  if (!measurement || !measurement.candidate.found || !measurement.reference.found) {
    return null;
  }
  return {
    x: measurement.candidate.centerX - measurement.reference.centerX,
    y: measurement.candidate.centerY - measurement.reference.centerY,
  };
}

function flippedSign(current: number, earlier: number): boolean {
  return (current > 0 && earlier < 0) || (current < 0 && earlier > 0);
}

export function cloneParameters(parameters: RenderParameters): RenderParameters {
  const offsets: Record<string, FieldOffset> = {};
  for (const [field, offset] of Object.entries(parameters.offsets)) {
    offsets[field] = { dx: offset.dx, dy: offset.dy };
  }
  return { offsets };
}

export class ProgressiveRefiner {
  private readonly options: RefinerOptions;

  constructor(options: Partial<RefinerOptions> = {}) {
    this.options = { ...DEFAULT_REFINER_OPTIONS, ...options };

    if (!Number.isInteger(this.options.convergenceWindow) || this.options.convergenceWindow < 2) {
      throw new RangeError(`convergenceWindow must be an integer >= 2, got ${this.options.convergenceWindow}`);
    }
    if (this.options.stepDecay <= 0 || this.options.stepDecay > 1) {
      throw new RangeError(`stepDecay must be in (0, 1], got ${this.options.stepDecay}`);
    }
    if (!Number.isInteger(this.options.decayInterval) || this.options.decayInterval < 1) {
      throw new RangeError(`decayInterval must be a positive integer, got ${this.options.decayInterval}`);
    }
  }

  get convergenceWindow(): number {
    return this.options.convergenceWindow;
  }

  stepSize(attemptNumber: number): number {
    const halvings = Math.floor(Math.max(0, attemptNumber - 1) / this.options.decayInterval);
    return this.options.initialStep * Math.pow(this.options.stepDecay, halvings);
  }

  /**
   * Offsets for the attempt after `previous`. Each detected field moves by
   * `-error * stepSize`; an axis whose error changed sign since the last
   * measured attempt in `history` moves by half that. Fields that were not
   * detected keep their previous offsets.
   */
  nextParameters(previous: VerificationAttempt, history: readonly VerificationAttempt[]): RenderParameters {
    const next = cloneParameters(previous.renderParameters);
    const step = this.stepSize(previous.attemptNumber);
    const earlier = this.lastMeasuredBefore(previous, history);

    for (const [field, measurement] of Object.entries(previous.fields)) {
      const error = signedError(measurement);
      if (!error) {
        continue;
      }

      const earlierError = earlier ? signedError(earlier.fields[field]) : null;
      const stepX = earlierError && flippedSign(error.x, earlierError.x) ? step / 2 : step;
      const stepY = earlierError && flippedSign(error.y, earlierError.y) ? step / 2 : step;

      const current = next.offsets[field] ?? { dx: 0, dy: 0 };
      next.offsets[field] = {
        dx: current.dx - error.x * stepX,
        dy: current.dy - error.y * stepY,
      };
    }

    logger.debug({
      attemptNumber: previous.attemptNumber,
      step,
      offsets: next.offsets,
    }, 'Computed refined render parameters');

    return next;
  }

  // Fields missing from the candidate render, limited to `requiredFields` when given
  undetectedFields(attempt: VerificationAttempt, requiredFields?: ReadonlySet<string>): string[] {
    return Object.entries(attempt.fields)
      .filter(([field, measurement]) => !measurement.candidate.found && (!requiredFields || requiredFields.has(field)))
      .map(([field]) => field);
  }

  /**
   * True when the trailing `convergenceWindow` attempts never improved on
   * their predecessor (their max differences are non-decreasing).
   */
  shouldAbort(history: readonly VerificationAttempt[]): boolean {
    const window = this.options.convergenceWindow;
    if (history.length < window) {
      return false;
    }

    const trailing = history.slice(-window).map((attempt) => attempt.maxDifference);
    for (let i = 1; i < trailing.length; i++) {
      if (trailing[i] < trailing[i - 1]) {
        return false;
      }
    }

    logger.warn({ window, trailing }, 'Refinement is not converging');
    return true;
  }

  private lastMeasuredBefore(
    previous: VerificationAttempt,
    history: readonly VerificationAttempt[]
  ): VerificationAttempt | undefined {
    for (let i = history.length - 1; i >= 0; i--) {
      const attempt = history[i];
      if (attempt.attemptNumber < previous.attemptNumber && attempt.error === undefined) {
        return attempt;
      }
    }
    return undefined;
  }
}
