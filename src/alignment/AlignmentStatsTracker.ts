/**
 * Alignment statistics tracker
 *
 * Keeps the most recent verification outcomes in a bounded ring buffer and
 * derives success rate, attempt distribution, per-field failure counts and
 * rule-based recommendations from whatever the buffer currently holds.
 */

import { createLogger } from '../utils/logger';
import { RingBuffer } from '../utils/RingBuffer';
import { ConfigurationError } from './errors';
import { formatZodError, StatsExportSchema } from './schemas';
import {
  DEFAULT_STATS_CAPACITY,
  StatsRecord,
  VerificationAttempt,
  VerificationResult,
} from './types';

const logger = createLogger('alignment-stats');

export interface StatsTrackerOptions {
  capacity: number;
  fieldFailureShare: number;       // share of failed runs that flags a field
  lowSuccessRate: number;
  moderateSuccessRate: number;
  highAverageAttempts: number;
  elevatedAverageAttempts: number;
  now: () => number;
}

export const DEFAULT_STATS_OPTIONS: StatsTrackerOptions = {
  capacity: DEFAULT_STATS_CAPACITY,
  fieldFailureShare: 0.5,
  lowSuccessRate: 0.8,
  moderateSuccessRate: 0.95,
  highAverageAttempts: 10,
  elevatedAverageAttempts: 5,
  now: () => Date.now(),
};

export interface StatsSummary {
  total: number;
  passes: number;
  failures: number;
  successRate: number;
  averageAttempts: number;
  attemptsHistogram: Record<string, number>;
  perFieldFailureCounts: Record<string, number>;
  mostCommonAttempts: number | null;
  bestAvailableCount: number;
}

// The attempt whose measurements describe the run's outcome
export function decidingAttempt(result: VerificationResult): VerificationAttempt | undefined {
  if (result.bestAttemptIndex !== null) {
    const chosen = result.attempts.find((attempt) => attempt.attemptNumber === result.bestAttemptIndex);
    if (chosen) {
      return chosen;
    }
  }
  return result.attempts[result.attempts.length - 1] ?? result.cacheProbe;
}

export class AlignmentStatsTracker {
  private readonly options: StatsTrackerOptions;
  private readonly records: RingBuffer<StatsRecord>;

  constructor(options: Partial<StatsTrackerOptions> = {}) {
    this.options = { ...DEFAULT_STATS_OPTIONS, ...options };
    this.records = new RingBuffer<StatsRecord>(this.options.capacity);
  }

  get size(): number {
    return this.records.size;
  }

  get capacity(): number {
    return this.records.capacity;
  }

  record(result: VerificationResult): StatsRecord {
    const attempt = decidingAttempt(result);
    const fieldOutcomes: Record<string, boolean> = {};
    if (attempt) {
      for (const [field, measurement] of Object.entries(attempt.fields)) {
        if (measurement.required) {
          fieldOutcomes[field] = measurement.withinTolerance;
        }
      }
    }

    const entry: StatsRecord = {
      passed: result.passed,
      attemptsUsed: result.attemptsUsed,
      fieldOutcomes,
      maxDifference: attempt ? attempt.maxDifference : Number.POSITIVE_INFINITY,
      usedBestAvailable: result.usedBestAvailable,
      terminationReason: result.terminationReason,
      timestamp: this.options.now(),
    };
    this.records.push(entry);

    logger.debug({
      runId: result.runId,
      passed: entry.passed,
      attemptsUsed: entry.attemptsUsed,
      terminationReason: entry.terminationReason,
    }, 'Recorded verification outcome');

    return entry;
  }

  getRecords(): StatsRecord[] {
    return this.records.toArray();
  }

  summary(): StatsSummary {
    const records = this.records.toArray();
    const total = records.length;
    const passes = records.filter((record) => record.passed).length;

    const histogram = new Map<number, number>();
    const fieldFailures = new Map<string, number>();
    let attemptSum = 0;
    let bestAvailableCount = 0;

    for (const record of records) {
      attemptSum += record.attemptsUsed;
      histogram.set(record.attemptsUsed, (histogram.get(record.attemptsUsed) ?? 0) + 1);
      if (record.usedBestAvailable) {
        bestAvailableCount++;
      }
      for (const [field, ok] of Object.entries(record.fieldOutcomes)) {
        fieldFailures.set(field, (fieldFailures.get(field) ?? 0) + (ok ? 0 : 1));
      }
    }

    const attemptsHistogram: Record<string, number> = {};
    let mostCommonAttempts: number | null = null;
    let mostCommonCount = 0;
    for (const attempts of [...histogram.keys()].sort((a, b) => a - b)) {
      const count = histogram.get(attempts) ?? 0;
      attemptsHistogram[String(attempts)] = count;
      if (count > mostCommonCount) {
        mostCommonAttempts = attempts;
        mostCommonCount = count;
      }
    }

    const perFieldFailureCounts: Record<string, number> = {};
    for (const field of [...fieldFailures.keys()].sort()) {
      perFieldFailureCounts[field] = fieldFailures.get(field) ?? 0;
    }

    return {
      total,
      passes,
      failures: total - passes,
      successRate: total > 0 ? passes / total : 0,
      averageAttempts: total > 0 ? attemptSum / total : 0,
      attemptsHistogram,
      perFieldFailureCounts,
      mostCommonAttempts,
      bestAvailableCount,
    };
  }

  recommendations(): string[] {
    const summary = this.summary();
    if (summary.total === 0) {
      return ['No verifications recorded yet; recommendations need data.'];
    }

    const recommendations: string[] = [];
    const successPct = (summary.successRate * 100).toFixed(1);
    const averageAttempts = summary.averageAttempts.toFixed(1);

    if (summary.successRate < this.options.lowSuccessRate) {
      recommendations.push(
        `Low success rate (${successPct}%): review the field search windows and default render positions.`
      );
    } else if (summary.successRate < this.options.moderateSuccessRate) {
      recommendations.push(`Moderate success rate (${successPct}%): some alignment tuning may improve reliability.`);
    } else {
      recommendations.push(`Good success rate (${successPct}%).`);
    }

    if (summary.averageAttempts > this.options.highAverageAttempts) {
      recommendations.push(
        `High average attempts (${averageAttempts}): enable the position cache or reduce the refiner decay interval.`
      );
    } else if (summary.averageAttempts > this.options.elevatedAverageAttempts) {
      recommendations.push(`Average attempts is ${averageAttempts}: acceptable, with room to optimise.`);
    } else {
      recommendations.push(`Low average attempts (${averageAttempts}).`);
    }

    if (summary.failures > 0) {
      const flagged = Object.entries(summary.perFieldFailureCounts)
        .filter(([, count]) => count / summary.failures >= this.options.fieldFailureShare)
        .sort(([fieldA, countA], [fieldB, countB]) => countB - countA || fieldA.localeCompare(fieldB));
      for (const [field, count] of flagged) {
        recommendations.push(
          `Field "${field}" failed in ${count} of ${summary.failures} failed runs: check its default position and search window.`
        );
      }
    }

    if (summary.mostCommonAttempts === 1) {
      recommendations.push('Most certificates align on the first attempt.');
    }

    return recommendations;
  }

  reset(): void {
    this.records.clear();
    logger.info('Reset alignment statistics');
  }

  export(): string {
    return JSON.stringify(
      {
        exportedAt: new Date(this.options.now()).toISOString(),
        capacity: this.records.capacity,
        summary: this.summary(),
        recommendations: this.recommendations(),
        records: this.records.toArray(),
      },
      null,
      2
    );
  }

  /**
   * Replace the buffer with the records of an `export()` document. Only the
   * newest `capacity` records are kept.
   */
  restore(json: string): number {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw new ConfigurationError('Statistics export is not valid JSON', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = StatsExportSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid statistics export: ${formatZodError(parsed.error)}`);
    }

    this.records.clear();
    for (const record of parsed.data.records.slice(-this.records.capacity)) {
      this.records.push(record);
    }

    logger.info({ restored: this.records.size }, 'Restored alignment statistics');
    return this.records.size;
  }
}
