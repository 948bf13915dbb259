/**
 * Certificate field alignment types
 *
 * Shared vocabulary for the locator, comparator, refiner, verifier, position
 * cache and statistics tracker. Absence of a field is always modelled
 * explicitly: a missing detection is `{ found: false }` and its difference is
 * infinite, never zero.
 */

import type { RasterImage } from '../platform/imageio/sharp';

export type { RasterImage };

// Fractional [min, max] range of an image dimension (0-1 scale)
export type FractionalWindow = readonly [number, number];

export interface FieldSpec {
  name: string;
  searchWindow: FractionalWindow;
  darknessThreshold: number;     // luminance below this counts as ink (0-255)
  minInkPixels: number;          // ink pixels a row needs to be text-bearing
  minInkColumnPixels: number;    // ink pixels a column needs inside the band
  maxRowGap: number;             // blank rows bridged inside one band
  horizontalWindow: FractionalWindow;
  required: boolean;
}

export interface FieldBounds {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

export type DetectedPosition =
  | { found: true; centerX: number; centerY: number; bounds: FieldBounds }
  | { found: false };

export const NOT_DETECTED: DetectedPosition = Object.freeze({ found: false });

export interface FieldDifference {
  dy: number;
  dx: number;
  distance: number;
}

export interface FieldMeasurement {
  candidate: DetectedPosition;
  reference: DetectedPosition;
  difference: FieldDifference;
  withinTolerance: boolean;
  // Only required fields can fail a run
  required: boolean;
}

export interface FieldOffset {
  dx: number;
  dy: number;
}

// Pixel offsets the renderer applies to each field's default position
export interface RenderParameters {
  offsets: Record<string, FieldOffset>;
}

export type FieldValues = Record<string, string>;

export interface RenderContext {
  attemptNumber: number;
  signal?: AbortSignal;
}

export type RenderOutput = RasterImage | Buffer;

export type RenderFn = (
  fields: Readonly<FieldValues>,
  parameters: RenderParameters,
  context: RenderContext
) => RenderOutput | Promise<RenderOutput>;

export type AttemptSource = 'cache' | 'refinement';

export interface VerificationAttempt {
  attemptNumber: number;
  source: AttemptSource;
  renderParameters: RenderParameters;
  fields: Record<string, FieldMeasurement>;
  maxDifference: number;
  allFieldsDetected: boolean;
  passed: boolean;
  error?: string;
  durationMs: number;
  imageDifferenceRatio?: number;
}

export type TerminationReason = 'passed' | 'exhausted' | 'diverged' | 'timeout' | 'cancelled';

export type IssueKind =
  | 'RenderError'
  | 'FieldNotDetected'
  | 'CacheInvalid'
  | 'ConvergenceFailure'
  | 'Timeout'
  | 'Cancelled';

export interface VerificationIssue {
  kind: IssueKind;
  message: string;
  attemptNumber?: number;
  field?: string;
}

export interface VerificationResult {
  runId: string;
  attempts: VerificationAttempt[];
  passed: boolean;
  attemptsUsed: number;
  usedBestAvailable: boolean;
  bestAttemptIndex: number | null;
  tolerancePx: number;
  terminationReason: TerminationReason;
  usedCache: boolean;
  cacheProbe?: VerificationAttempt;
  issues: VerificationIssue[];
}

export interface CacheEntry {
  key: string;
  payload: RenderParameters;
  createdAt: number;
  ttlSeconds: number;
}

export interface StatsRecord {
  passed: boolean;
  attemptsUsed: number;
  fieldOutcomes: Record<string, boolean>;
  maxDifference: number;
  usedBestAvailable: boolean;
  terminationReason: TerminationReason;
  timestamp: number;
}

export const DEFAULT_TOLERANCE_PX = 1;
export const DEFAULT_MAX_ATTEMPTS = 30;
export const DEFAULT_CONVERGENCE_WINDOW = 3;
export const DEFAULT_STATS_CAPACITY = 100;
export const DEFAULT_CACHE_TTL_SECONDS = 24 * 60 * 60;
