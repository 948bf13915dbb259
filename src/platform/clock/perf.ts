/**
 * Monotonic clock and wall-clock budgets for the verification loop.
 *
 * The verifier takes a Clock by injection so run budgets can be driven
 * deterministically in tests.
 */

import { performance } from 'perf_hooks';

export interface Clock {
  now(): number;
}

export class PerformanceClock implements Clock {
  now(): number {
    return performance.now();
  }
}

let globalClock: PerformanceClock | undefined;

export function getClock(): PerformanceClock {
  if (!globalClock) {
    globalClock = new PerformanceClock();
  }
  return globalClock;
}

// Budget measured against real elapsed time; an undefined total never runs out
export class TimeBudget {
  private readonly startTime: number;

  constructor(private readonly totalMs: number | undefined, private readonly clock: Clock = getClock()) {
    this.startTime = clock.now();
  }

  get msTotal(): number | undefined {
    return this.totalMs;
  }

  get elapsedMs(): number {
    return this.clock.now() - this.startTime;
  }

  get msRemaining(): number {
    if (this.totalMs === undefined) {
      return Number.POSITIVE_INFINITY;
    }
    return Math.max(0, this.totalMs - this.elapsedMs);
  }

  get isExhausted(): boolean {
    return this.msRemaining <= 0;
  }

  /**
   * Time available for the next operation: the smaller of its own cap and
   * what is left of this budget. Undefined means no limit applies.
   */
  limitFor(operationCapMs?: number): number | undefined {
    const remaining = this.msRemaining;
    if (operationCapMs === undefined) {
      return Number.isFinite(remaining) ? remaining : undefined;
    }
    return Math.min(operationCapMs, remaining);
  }
}
