/**
 * Iterative Verifier
 *
 * Drives the render -> locate -> compare -> refine loop for one certificate:
 *
 *   CacheProbe -> Rendering -> Locating -> Comparing -> Passed
 *                     ^                         |
 *                     +------- Refining <-------+-> Exhausted | Diverged
 *
 * plus Timeout and Cancelled, which can interrupt any render. Every terminal
 * state other than Passed falls back to the best attempt that detected all
 * required fields. Only setup and boundary mistakes are thrown; everything
 * that goes wrong during the loop is reported as an issue on the result.
 */

import { v4 as uuidv4 } from 'uuid';
import { Clock, getClock, TimeBudget } from '../platform/clock/perf';
import { ImageIO, isRasterImage, SharpImageIO } from '../platform/imageio/sharp';
import { createLogger, Logger } from '../utils/logger';
import { imageDifference, measureFields } from './AlignmentComparator';
import { AlignmentStatsTracker } from './AlignmentStatsTracker';
import {
  ConfigurationError,
  FieldValidationError,
  RenderError,
  RenderTimeoutError,
  RunCancelledError,
} from './errors';
import { FieldLocator } from './FieldLocator';
import { PositionCache } from './PositionCache';
import { cloneParameters, ProgressiveRefiner } from './ProgressiveRefiner';
import {
  AttemptSource,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TOLERANCE_PX,
  DetectedPosition,
  FieldSpec,
  FieldValues,
  RasterImage,
  RenderFn,
  RenderOutput,
  RenderParameters,
  TerminationReason,
  VerificationAttempt,
  VerificationIssue,
  VerificationResult,
} from './types';

const logger = createLogger('iterative-verifier');

export interface VerificationRequest {
  fields: Readonly<FieldValues>;
  render: RenderFn;
  reference: RasterImage;
  fieldSpecs: readonly FieldSpec[];
  tolerancePx?: number;
  maxAttempts?: number;
  initialParameters?: RenderParameters;
  signal?: AbortSignal;
  attemptTimeoutMs?: number;
  runTimeoutMs?: number;
  computeImageDifference?: boolean;
}

export interface VerifierDefaults {
  tolerancePx: number;
  maxAttempts: number;
  attemptTimeoutMs?: number;
  runTimeoutMs?: number;
}

export interface IterativeVerifierDeps {
  cache?: PositionCache;
  stats?: AlignmentStatsTracker;
  refiner?: ProgressiveRefiner;
  locator?: FieldLocator;
  imageIO?: ImageIO;
  clock?: Clock;
  defaults?: Partial<VerifierDefaults>;
}

interface RunContext {
  runId: string;
  request: VerificationRequest;
  specs: readonly FieldSpec[];
  requiredFields: ReadonlySet<string>;
  cacheFields: FieldValues;
  referencePositions: Record<string, DetectedPosition>;
  tolerancePx: number;
  attemptTimeoutMs?: number;
  budget: TimeBudget;
  log: Logger;
}

type RenderOutcome =
  | { kind: 'image'; image: RasterImage }
  | { kind: 'error'; error: RenderError }
  | { kind: 'timeout'; limitMs: number }
  | { kind: 'cancelled' };

type AttemptOutcome =
  | { kind: 'completed'; attempt: VerificationAttempt }
  | { kind: 'interrupted'; reason: 'timeout'; error: RenderTimeoutError }
  | { kind: 'interrupted'; reason: 'cancelled'; error: RunCancelledError };

/**
 * Lowest `maxDifference` among error-free attempts that detected every
 * required field. Ties go to the earliest attempt.
 */
export function selectBestAttempt(attempts: readonly VerificationAttempt[]): VerificationAttempt | undefined {
  let best: VerificationAttempt | undefined;
  for (const attempt of attempts) {
    if (!attempt.allFieldsDetected || attempt.error !== undefined) {
      continue;
    }
    if (!best || attempt.maxDifference < best.maxDifference) {
      best = attempt;
    }
  }
  return best;
}

// Cache entries are keyed on the required fields alone
function pickFields(fields: Readonly<FieldValues>, names: ReadonlySet<string>): FieldValues {
  const picked: FieldValues = {};
  for (const name of names) {
    picked[name] = fields[name];
  }
  return picked;
}

function isPositiveLimit(value: number | undefined): boolean {
  return value === undefined || (Number.isFinite(value) && value > 0);
}

export class IterativeVerifier {
  private readonly cache?: PositionCache;
  private readonly stats?: AlignmentStatsTracker;
  private readonly refiner: ProgressiveRefiner;
  private readonly locator: FieldLocator;
  private readonly imageIO: ImageIO;
  private readonly clock: Clock;
  private readonly defaults: VerifierDefaults;

  constructor(deps: IterativeVerifierDeps = {}) {
    this.cache = deps.cache;
    this.stats = deps.stats;
    this.refiner = deps.refiner ?? new ProgressiveRefiner();
    this.locator = deps.locator ?? new FieldLocator();
    this.imageIO = deps.imageIO ?? new SharpImageIO();
    this.clock = deps.clock ?? getClock();
    this.defaults = {
      tolerancePx: DEFAULT_TOLERANCE_PX,
      maxAttempts: DEFAULT_MAX_ATTEMPTS,
      ...deps.defaults,
    };
  }

  async verify(request: VerificationRequest): Promise<VerificationResult> {
    const tolerancePx = request.tolerancePx ?? this.defaults.tolerancePx;
    const maxAttempts = request.maxAttempts ?? this.defaults.maxAttempts;
    const attemptTimeoutMs = request.attemptTimeoutMs ?? this.defaults.attemptTimeoutMs;
    const runTimeoutMs = request.runTimeoutMs ?? this.defaults.runTimeoutMs;

    this.validateSetup(request, tolerancePx, maxAttempts, attemptTimeoutMs, runTimeoutMs);
    const requiredFields = new Set(request.fieldSpecs.filter((spec) => spec.required).map((spec) => spec.name));
    this.validateFields(request, requiredFields);
    const referencePositions = this.locateReference(request, requiredFields);

    const runId = uuidv4();
    const run: RunContext = {
      runId,
      request,
      specs: request.fieldSpecs,
      requiredFields,
      cacheFields: pickFields(request.fields, requiredFields),
      referencePositions,
      tolerancePx,
      attemptTimeoutMs,
      budget: new TimeBudget(runTimeoutMs, this.clock),
      log: logger.child({ runId }),
    };

    run.log.info({
      fields: Object.keys(request.fields),
      tolerancePx,
      maxAttempts,
      attemptTimeoutMs,
      runTimeoutMs,
    }, 'Starting alignment verification');

    const issues: VerificationIssue[] = [];
    let cacheProbe: VerificationAttempt | undefined;
    let usedCache = false;

    const cached = this.cache?.lookup(run.cacheFields);
    if (cached) {
      usedCache = true;
      const probe = await this.runAttempt(run, 1, 'cache', cached.payload);

      if (probe.kind === 'interrupted') {
        issues.push({ kind: probe.reason === 'timeout' ? 'Timeout' : 'Cancelled', message: probe.error.message });
        return this.finish(run, { attempts: [], terminationReason: probe.reason, usedCache, issues });
      }

      if (probe.attempt.passed) {
        run.log.info({ maxDifference: probe.attempt.maxDifference }, 'Cached render parameters verified');
        return this.finish(run, { attempts: [probe.attempt], terminationReason: 'passed', usedCache, issues });
      }

      cacheProbe = probe.attempt;
      // Another run may have stored verified parameters while this probe rendered
      this.cache?.invalidateIf(run.cacheFields, cached);
      issues.push({
        kind: 'CacheInvalid',
        message: probe.attempt.error ?? `Cached render parameters failed revalidation (max difference ${probe.attempt.maxDifference.toFixed(2)}px)`,
      });
      run.log.warn({ maxDifference: probe.attempt.maxDifference }, 'Cached render parameters failed revalidation');
    }

    const attempts: VerificationAttempt[] = [];
    const reportedUndetected = new Set<string>();
    let parameters = cloneParameters(request.initialParameters ?? { offsets: {} });
    let terminationReason: TerminationReason = 'exhausted';

    for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber++) {
      const outcome = await this.runAttempt(run, attemptNumber, 'refinement', parameters);

      if (outcome.kind === 'interrupted') {
        terminationReason = outcome.reason;
        issues.push({
          kind: outcome.reason === 'timeout' ? 'Timeout' : 'Cancelled',
          message: outcome.error.message,
          attemptNumber,
        });
        break;
      }

      const attempt = outcome.attempt;
      attempts.push(attempt);

      if (attempt.error !== undefined) {
        issues.push({ kind: 'RenderError', message: attempt.error, attemptNumber });
      } else {
        for (const field of this.refiner.undetectedFields(attempt, requiredFields)) {
          if (reportedUndetected.has(field)) {
            continue;
          }
          reportedUndetected.add(field);
          issues.push({
            kind: 'FieldNotDetected',
            message: `Field "${field}" was not detected in the rendered image`,
            attemptNumber,
            field,
          });
        }
      }

      if (attempt.passed) {
        terminationReason = 'passed';
        break;
      }

      // Render failures carry no measurement and do not count toward divergence
      const measured = attempts.filter((entry) => entry.error === undefined);
      if (attempt.error === undefined && this.refiner.shouldAbort(measured)) {
        terminationReason = 'diverged';
        issues.push({
          kind: 'ConvergenceFailure',
          message: `No improvement over the last ${this.refiner.convergenceWindow} attempts`,
          attemptNumber,
        });
        break;
      }

      if (attemptNumber < maxAttempts) {
        parameters = this.refiner.nextParameters(attempt, attempts);
      }
    }

    return this.finish(run, { attempts, terminationReason, usedCache, cacheProbe, issues });
  }

  private finish(
    run: RunContext,
    outcome: {
      attempts: VerificationAttempt[];
      terminationReason: TerminationReason;
      usedCache: boolean;
      cacheProbe?: VerificationAttempt;
      issues: VerificationIssue[];
    }
  ): VerificationResult {
    const last = outcome.attempts[outcome.attempts.length - 1];
    const passed = outcome.terminationReason === 'passed' && last !== undefined && last.passed;
    const best = passed ? last : selectBestAttempt(outcome.attempts);

    const result: VerificationResult = {
      runId: run.runId,
      attempts: outcome.attempts,
      passed,
      attemptsUsed: outcome.attempts.length,
      usedBestAvailable: !passed && best !== undefined,
      bestAttemptIndex: best ? best.attemptNumber : null,
      tolerancePx: run.tolerancePx,
      terminationReason: outcome.terminationReason,
      usedCache: outcome.usedCache,
      issues: outcome.issues,
    };
    if (outcome.cacheProbe) {
      result.cacheProbe = outcome.cacheProbe;
    }

    // A verified cache hit is already stored
    if (passed && best && best.source === 'refinement') {
      this.cache?.set(run.cacheFields, best.renderParameters);
    }
    this.stats?.record(result);

    run.log.info({
      passed: result.passed,
      attemptsUsed: result.attemptsUsed,
      terminationReason: result.terminationReason,
      bestAttemptIndex: result.bestAttemptIndex,
      usedBestAvailable: result.usedBestAvailable,
      maxDifference: best ? best.maxDifference : null,
      elapsedMs: Math.round(run.budget.elapsedMs),
    }, 'Alignment verification finished');

    return result;
  }

  private async runAttempt(
    run: RunContext,
    attemptNumber: number,
    source: AttemptSource,
    parameters: RenderParameters
  ): Promise<AttemptOutcome> {
    const startedAt = this.clock.now();
    const outcome = await this.render(run, attemptNumber, parameters);

    if (outcome.kind === 'timeout') {
      const error = new RenderTimeoutError(attemptNumber, outcome.limitMs);
      run.log.warn({ attemptNumber, err: error }, 'Render exceeded its time budget');
      return { kind: 'interrupted', reason: 'timeout', error };
    }
    if (outcome.kind === 'cancelled') {
      const error = new RunCancelledError(attemptNumber);
      run.log.info({ attemptNumber }, 'Verification cancelled');
      return { kind: 'interrupted', reason: 'cancelled', error };
    }

    if (outcome.kind === 'error') {
      run.log.warn({ attemptNumber, err: outcome.error }, 'Render failed');
      const failed = measureFields({}, run.referencePositions, run.specs, run.tolerancePx);
      return {
        kind: 'completed',
        attempt: {
          attemptNumber,
          source,
          renderParameters: cloneParameters(parameters),
          fields: failed.fields,
          maxDifference: failed.maxDifference,
          allFieldsDetected: false,
          passed: false,
          error: outcome.error.message,
          durationMs: this.clock.now() - startedAt,
        },
      };
    }

    const candidatePositions = this.locator.locateAll(outcome.image, run.specs);
    const comparison = measureFields(candidatePositions, run.referencePositions, run.specs, run.tolerancePx);

    const attempt: VerificationAttempt = {
      attemptNumber,
      source,
      renderParameters: cloneParameters(parameters),
      fields: comparison.fields,
      maxDifference: comparison.maxDifference,
      allFieldsDetected: comparison.allFieldsDetected,
      passed: comparison.passed,
      durationMs: this.clock.now() - startedAt,
    };
    if (run.request.computeImageDifference) {
      attempt.imageDifferenceRatio = imageDifference(outcome.image, run.request.reference).differentPixelRatio;
    }

    run.log.debug({
      attemptNumber,
      source,
      maxDifference: attempt.maxDifference,
      allFieldsDetected: attempt.allFieldsDetected,
      passed: attempt.passed,
      durationMs: Math.round(attempt.durationMs),
    }, 'Attempt measured');

    return { kind: 'completed', attempt };
  }

  /**
   * Race the render callback against the attempt/run budget and the caller's
   * signal. The callback receives a signal of its own that aborts when the
   * race is lost, so a cooperative renderer can stop early.
   */
  private async render(run: RunContext, attemptNumber: number, parameters: RenderParameters): Promise<RenderOutcome> {
    const { signal } = run.request;
    if (signal?.aborted) {
      return { kind: 'cancelled' };
    }

    if (run.budget.isExhausted) {
      return { kind: 'timeout', limitMs: run.budget.msTotal ?? 0 };
    }
    const limitMs = run.budget.limitFor(run.attemptTimeoutMs);

    const controller = new AbortController();
    const cleanup: Array<() => void> = [];

    const interrupted = new Promise<RenderOutcome>((resolve) => {
      if (limitMs !== undefined) {
        const timer = setTimeout(() => resolve({ kind: 'timeout', limitMs }), limitMs);
        cleanup.push(() => clearTimeout(timer));
      }
      if (signal) {
        const onAbort = (): void => resolve({ kind: 'cancelled' });
        signal.addEventListener('abort', onAbort, { once: true });
        cleanup.push(() => signal.removeEventListener('abort', onAbort));
      }
    });

    const rendering = (async (): Promise<RenderOutcome> => {
      try {
        const output = await run.request.render(run.request.fields, cloneParameters(parameters), {
          attemptNumber,
          signal: controller.signal,
        });
        return { kind: 'image', image: await this.toRaster(output) };
      } catch (error) {
        return { kind: 'error', error: new RenderError(attemptNumber, error) };
      }
    })();

    try {
      const outcome = await Promise.race([rendering, interrupted]);
      if (outcome.kind === 'timeout' || outcome.kind === 'cancelled') {
        controller.abort();
      }
      return outcome;
    } finally {
      for (const release of cleanup) {
        release();
      }
    }
  }

  private async toRaster(output: RenderOutput): Promise<RasterImage> {
    if (isRasterImage(output)) {
      const expected = output.width * output.height * output.channels;
      if (output.width <= 0 || output.height <= 0 || output.channels < 1 || output.data.length < expected) {
        throw new Error(
          `Raster of ${output.width}x${output.height}x${output.channels} carries ${output.data.length} bytes, expected ${expected}`
        );
      }
      return output;
    }
    if (Buffer.isBuffer(output)) {
      return this.imageIO.decode(output);
    }
    throw new Error('Render output is neither a raster image nor an encoded image buffer');
  }

  private validateSetup(
    request: VerificationRequest,
    tolerancePx: number,
    maxAttempts: number,
    attemptTimeoutMs: number | undefined,
    runTimeoutMs: number | undefined
  ): void {
    if (request.fieldSpecs.length === 0) {
      throw new ConfigurationError('At least one field spec is required');
    }
    if (!request.fieldSpecs.some((spec) => spec.required)) {
      throw new ConfigurationError('At least one field spec must be required');
    }
    if (!Number.isFinite(tolerancePx) || tolerancePx < 0) {
      throw new ConfigurationError(`tolerancePx must be a finite non-negative number, got ${tolerancePx}`, { tolerancePx });
    }
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError(`maxAttempts must be a positive integer, got ${maxAttempts}`, { maxAttempts });
    }
    if (!isPositiveLimit(attemptTimeoutMs) || !isPositiveLimit(runTimeoutMs)) {
      throw new ConfigurationError('Timeouts must be positive numbers of milliseconds', { attemptTimeoutMs, runTimeoutMs });
    }
    if (!isRasterImage(request.reference)) {
      throw new ConfigurationError('Reference image must be a decoded raster');
    }
  }

  private validateFields(request: VerificationRequest, requiredFields: ReadonlySet<string>): void {
    const known = new Set(request.fieldSpecs.map((spec) => spec.name));
    const unknown = Object.keys(request.fields).filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new FieldValidationError(`Unknown field(s): ${unknown.join(', ')}`, { unknown });
    }

    const missing = [...requiredFields].filter((name) => {
      const value = request.fields[name];
      return typeof value !== 'string' || value.trim().length === 0;
    });
    if (missing.length > 0) {
      throw new FieldValidationError(`Missing required field(s): ${missing.join(', ')}`, { missing });
    }
  }

  private locateReference(
    request: VerificationRequest,
    requiredFields: ReadonlySet<string>
  ): Record<string, DetectedPosition> {
    const positions = this.locator.locateAll(request.reference, request.fieldSpecs);
    const absent = [...requiredFields].filter((name) => !positions[name]?.found);
    if (absent.length > 0) {
      throw new ConfigurationError(`Reference image has no detectable text for field(s): ${absent.join(', ')}`, {
        absent,
      });
    }
    return positions;
  }
}
