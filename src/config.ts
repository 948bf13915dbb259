import { z } from 'zod';
import dotenv from 'dotenv';
import { AlignmentStatsTracker } from './alignment/AlignmentStatsTracker';
import { BatchEntry, DEFAULT_BATCH_CONCURRENCY, verifyBatch } from './alignment/BatchVerifier';
import { ConfigurationError } from './alignment/errors';
import { IterativeVerifier, VerificationRequest } from './alignment/IterativeVerifier';
import { PositionCache } from './alignment/PositionCache';
import { ProgressiveRefiner } from './alignment/ProgressiveRefiner';
import { loadFieldSpecs, loadReferenceImage } from './alignment/reference';
import { formatZodError } from './alignment/schemas';
import { FieldSpec, RasterImage } from './alignment/types';
import { SharpImageIO } from './platform/imageio/sharp';
import { createLogger, setLogLevel } from './utils/logger';

dotenv.config();

const logger = createLogger('config');

// Zod schema for complete config validation
const ConfigSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),

  alignment: z.object({
    tolerancePx: z.number().min(0).default(1),
    maxAttempts: z.number().int().min(1).max(1000).default(30),
    attemptTimeoutMs: z.number().int().min(1).optional(),
    runTimeoutMs: z.number().int().min(1).optional(),
  }),

  refiner: z.object({
    convergenceWindow: z.number().int().min(2).default(3),
    initialStep: z.number().positive().default(1),
    stepDecay: z.number().gt(0).max(1).default(0.5),
    decayInterval: z.number().int().min(1).default(3),
  }),

  cache: z.object({
    ttlSeconds: z.number().int().min(1).default(86400),
    checkPeriodSeconds: z.number().int().min(0).default(600),
    path: z.string().min(1).optional(),
  }),

  stats: z.object({
    capacity: z.number().int().min(1).default(100),
  }),

  batch: z.object({
    concurrency: z.number().int().min(1).max(64).default(DEFAULT_BATCH_CONCURRENCY),
  }),

  reference: z.object({
    fieldSpecsPath: z.string().min(1).default('config/field-specs.json'),
    imagePath: z.string().min(1).optional(),
  }),

  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export type AlignmentConfig = z.infer<typeof ConfigSchema>;

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

function optionalString(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

// Parse and validate configuration from environment
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AlignmentConfig {
  const rawConfig = {
    env: optionalString(env.NODE_ENV),

    alignment: {
      tolerancePx: optionalNumber(env.ALIGNMENT_TOLERANCE_PX),
      maxAttempts: optionalNumber(env.ALIGNMENT_MAX_ATTEMPTS),
      attemptTimeoutMs: optionalNumber(env.ALIGNMENT_ATTEMPT_TIMEOUT_MS),
      runTimeoutMs: optionalNumber(env.ALIGNMENT_RUN_TIMEOUT_MS),
    },

    refiner: {
      convergenceWindow: optionalNumber(env.ALIGNMENT_CONVERGENCE_WINDOW),
      initialStep: optionalNumber(env.ALIGNMENT_INITIAL_STEP),
      stepDecay: optionalNumber(env.ALIGNMENT_STEP_DECAY),
      decayInterval: optionalNumber(env.ALIGNMENT_DECAY_INTERVAL),
    },

    cache: {
      ttlSeconds: optionalNumber(env.POSITION_CACHE_TTL_SECONDS),
      checkPeriodSeconds: optionalNumber(env.POSITION_CACHE_CHECK_PERIOD_SECONDS),
      path: optionalString(env.POSITION_CACHE_PATH),
    },

    stats: {
      capacity: optionalNumber(env.ALIGNMENT_STATS_CAPACITY),
    },

    batch: {
      concurrency: optionalNumber(env.BATCH_CONCURRENCY),
    },

    reference: {
      fieldSpecsPath: optionalString(env.FIELD_SPECS_PATH),
      imagePath: optionalString(env.REFERENCE_IMAGE_PATH),
    },

    logLevel: optionalString(env.LOG_LEVEL),
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid alignment configuration: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export interface AlignmentToolkit {
  config: AlignmentConfig;
  fieldSpecs: FieldSpec[];
  reference?: RasterImage;
  cache: PositionCache;
  stats: AlignmentStatsTracker;
  refiner: ProgressiveRefiner;
  verifier: IterativeVerifier;
  // verifyBatch at the configured concurrency
  verifyBatch(requests: readonly VerificationRequest[]): Promise<BatchEntry[]>;
  close(): Promise<void>;
}

/**
 * Load the field specs (and the reference image, when a path is set) and wire
 * one shared cache, tracker and refiner into a verifier. When a cache path is
 * configured the cache is loaded from it here and written back on `close()`.
 */
export async function createAlignmentToolkit(config: AlignmentConfig = loadConfig()): Promise<AlignmentToolkit> {
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }

  const imageIO = new SharpImageIO();
  const fieldSpecs = await loadFieldSpecs(config.reference.fieldSpecsPath);
  const reference = config.reference.imagePath
    ? await loadReferenceImage(config.reference.imagePath, imageIO)
    : undefined;

  const cache = new PositionCache({
    ttlSeconds: config.cache.ttlSeconds,
    checkPeriodSeconds: config.cache.checkPeriodSeconds,
  });
  const cachePath = config.cache.path;
  if (cachePath) {
    await cache.loadFromFile(cachePath);
  }

  const stats = new AlignmentStatsTracker({ capacity: config.stats.capacity });
  const refiner = new ProgressiveRefiner(config.refiner);
  const verifier = new IterativeVerifier({
    cache,
    stats,
    refiner,
    imageIO,
    defaults: config.alignment,
  });

  logger.info({
    tolerancePx: config.alignment.tolerancePx,
    maxAttempts: config.alignment.maxAttempts,
    cacheTtlSeconds: config.cache.ttlSeconds,
    cachePath,
    statsCapacity: config.stats.capacity,
    batchConcurrency: config.batch.concurrency,
    fields: fieldSpecs.map((spec) => spec.name),
    referenceImage: config.reference.imagePath,
  }, 'Alignment toolkit ready');

  return {
    config,
    fieldSpecs,
    reference,
    cache,
    stats,
    refiner,
    verifier,
    verifyBatch: (requests) => verifyBatch(verifier, requests, { concurrency: config.batch.concurrency }),
    async close(): Promise<void> {
      if (cachePath) {
        await cache.saveToFile(cachePath);
      }
      cache.close();
    },
  };
}
