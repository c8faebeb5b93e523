import type { ConcurrencyConfig } from '../config/schema';
import type { ConcurrencyDecision, ConcurrencyMode } from './types';

export interface ExecutionStats {
  observed: number;  // executions started, finished or still open within the window
  completed: number;
  stalled: number;
  windowHours: number;
}

export type ConcurrencyPolicy = Pick<
  ConcurrencyConfig,
  | 'minWip'
  | 'maxWip'
  | 'focusWip'
  | 'balancedWip'
  | 'throughputWip'
  | 'focusStallRate'
  | 'throughputStallRate'
  | 'throughputCompletionsPerHour'
>;

/**
 * Picks a WIP limit from trailing execution stats:
 * many stalls → focus, steady completions with few stalls → throughput,
 * otherwise balanced. The result never preempts running work; it only
 * bounds future admissions.
 */
export class ConcurrencyController {
  constructor(private readonly policy: ConcurrencyPolicy) {}

  stallRate(stats: ExecutionStats): number {
    return stats.observed === 0 ? 0 : Math.min(1, stats.stalled / stats.observed);
  }

  completionRate(stats: ExecutionStats): number {
    return stats.windowHours <= 0 ? 0 : stats.completed / stats.windowHours;
  }

  decide(stats: ExecutionStats, previousWipLimit: number): ConcurrencyDecision {
    const stallRate = this.stallRate(stats);
    const completionRate = this.completionRate(stats);

    let mode: ConcurrencyMode = 'balanced';
    if (stallRate > this.policy.focusStallRate) {
      mode = 'focus';
    } else if (
      completionRate > this.policy.throughputCompletionsPerHour &&
      stallRate < this.policy.throughputStallRate
    ) {
      mode = 'throughput';
    }

    const target =
      mode === 'focus' ? this.policy.focusWip : mode === 'throughput' ? this.policy.throughputWip : this.policy.balancedWip;

    return {
      mode,
      wipLimit: this.clamp(target),
      previousWipLimit,
      stallRate,
      completionRate,
    };
  }

  clamp(wipLimit: number): number {
    return Math.min(this.policy.maxWip, Math.max(this.policy.minWip, Math.floor(wipLimit)));
  }
}
