import { createLogger } from '../utils/logger';
import { describeError } from './errors';
import { IterativeVerifier, VerificationRequest } from './IterativeVerifier';
import { VerificationResult } from './types';

const logger = createLogger('batch-verifier');

export const DEFAULT_BATCH_CONCURRENCY = 4;

export interface BatchOptions {
  concurrency?: number;
}

export type BatchEntry =
  | { status: 'fulfilled'; index: number; value: VerificationResult }
  | { status: 'rejected'; index: number; reason: Error };

/**
 * Verify many certificates on a bounded pool of workers. The verifier (and
 * the cache and tracker behind it) is shared by every worker. Entries come
 * back in request order; a request that fails validation is reported as a
 * rejected entry and the rest of the batch carries on.
 */
export async function verifyBatch(
  verifier: IterativeVerifier,
  requests: readonly VerificationRequest[],
  options: BatchOptions = {}
): Promise<BatchEntry[]> {
  const concurrency = options.concurrency ?? DEFAULT_BATCH_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const entries: BatchEntry[] = new Array(requests.length);
  let index = 0;

  async function worker(): Promise<void> {
    while (true) {
      const i = index++;
      if (i >= requests.length) return;
      try {
        entries[i] = { status: 'fulfilled', index: i, value: await verifier.verify(requests[i]) };
      } catch (error) {
        logger.warn({ index: i, err: error }, `Verification request ${i} rejected: ${describeError(error)}`);
        entries[i] = {
          status: 'rejected',
          index: i,
          reason: error instanceof Error ? error : new Error(String(error)),
        };
      }
    }
  }

  const started = Date.now();
  await Promise.all(Array.from({ length: Math.min(concurrency, requests.length) }, worker));

  const passed = entries.filter((entry) => entry.status === 'fulfilled' && entry.value.passed).length;
  logger.info({
    total: requests.length,
    passed,
    rejected: entries.filter((entry) => entry.status === 'rejected').length,
    concurrency,
    elapsedMs: Date.now() - started,
  }, 'Batch verification finished');

  return entries;
}
