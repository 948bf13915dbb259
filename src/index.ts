export * from './alignment/types';
export * from './alignment/errors';
export { FieldSpecSchema, FieldSpecListSchema, RenderParametersSchema } from './alignment/schemas';
export { FieldLocator, luminanceAt } from './alignment/FieldLocator';
export { compare, measureFields, imageDifference, UNDETECTED_DIFFERENCE } from './alignment/AlignmentComparator';
export type { FieldComparison, ImageDifference } from './alignment/AlignmentComparator';
export { ProgressiveRefiner, DEFAULT_REFINER_OPTIONS } from './alignment/ProgressiveRefiner';
export type { RefinerOptions } from './alignment/ProgressiveRefiner';
export { PositionCache, canonicalizeFieldText } from './alignment/PositionCache';
export type { PositionCacheOptions, PositionCacheStats } from './alignment/PositionCache';
export { AlignmentStatsTracker, DEFAULT_STATS_OPTIONS } from './alignment/AlignmentStatsTracker';
export type { StatsSummary, StatsTrackerOptions } from './alignment/AlignmentStatsTracker';
export { IterativeVerifier, selectBestAttempt } from './alignment/IterativeVerifier';
export type { IterativeVerifierDeps, VerificationRequest, VerifierDefaults } from './alignment/IterativeVerifier';
export { verifyBatch, DEFAULT_BATCH_CONCURRENCY } from './alignment/BatchVerifier';
export type { BatchEntry, BatchOptions } from './alignment/BatchVerifier';
export { loadFieldSpecs, loadReferenceImage, parseFieldSpecs } from './alignment/reference';
export { serializeResult, serializeAttempt } from './alignment/serialize';
export type { SerializedResult, SerializedAttempt } from './alignment/serialize';
export { SharpImageIO, isRasterImage } from './platform/imageio/sharp';
export type { ImageIO } from './platform/imageio/sharp';
export { TimeBudget, getClock } from './platform/clock/perf';
export type { Clock } from './platform/clock/perf';
export { createLogger, logger, setLogLevel } from './utils/logger';
export { loadConfig, createAlignmentToolkit } from './config';
export type { AlignmentConfig, AlignmentToolkit } from './config';
