import { CapacityViolationError, DependencyViolationError } from './errors';
import type { Logger } from '../logging';
import { silentLogger } from '../logging';
import type { WorkQueue } from './work-queue';
import type { ScheduleResult, SkippedItem, SkipReason, WorkItem } from './types';

export interface SchedulerConfig {
  unblockWeight: number;
}

export type AdmissionVerdict = { admit: true } | { admit: false; reason: SkipReason; detail: string };

export interface AdmissionPolicy {
  /** Which queued items this pass may consider at all. */
  include(item: WorkItem): boolean;
  /** Last check before admission; a refusal leaves the item queued. */
  check?(item: WorkItem): AdmissionVerdict;
  onAdmit?(item: WorkItem): void;
  agent?: string;
}

export interface ScoredItem {
  item: WorkItem;
  score: number;
  unblockCount: number;
}

export class Scheduler {
  private config: SchedulerConfig;
  private log: Logger;

  constructor(config?: Partial<SchedulerConfig>, log: Logger = silentLogger) {
    this.config = {
      unblockWeight: config?.unblockWeight ?? 2,
    };
    this.log = log;
  }

  score(queue: WorkQueue, item: WorkItem): ScoredItem {
    const unblockCount = queue.unblockCount(item.id);
    return { item, unblockCount, score: item.priority + this.config.unblockWeight * unblockCount };
  }

  /** Highest score first; ties go to the earliest enqueued, then lowest sequence. */
  rank(queue: WorkQueue, items: WorkItem[]): ScoredItem[] {
    return items
      .map((item) => this.score(queue, item))
      .sort((a, b) => {
        if (a.score !== b.score) return b.score - a.score;
        if (a.item.enqueuedAt !== b.item.enqueuedAt) return a.item.enqueuedAt - b.item.enqueuedAt;
        return a.item.seq - b.item.seq;
      });
  }

  /**
   * Fill free WIP slots with the best eligible work, one admission at a time
   * so every pick sees the scores left by the previous one.
   */
  scheduleNext(queue: WorkQueue, now: number, policy: AdmissionPolicy): ScheduleResult {
    const admitted: WorkItem[] = [];
    const skipped: SkippedItem[] = [];
    const passedOver = new Set<string>();

    while (queue.activeCount < queue.wipLimit) {
      const candidates = queue
        .getEligible(now)
        .filter((item) => policy.include(item) && !passedOver.has(item.id));
      if (candidates.length === 0) break;

      const [best] = this.rank(queue, candidates);
      const verdict = policy.check ? policy.check(best.item) : { admit: true as const };
      if (!verdict.admit) {
        passedOver.add(best.item.id);
        skipped.push({ id: best.item.id, reason: verdict.reason, detail: verdict.detail });
        this.log.debug(`Skipped ${best.item.id}: ${verdict.detail}`);
        continue;
      }

      this.admit(queue, best.item, now, policy.agent);
      policy.onAdmit?.(best.item);
      admitted.push(best.item);
      this.log.info(`Admitted ${best.item.id} (score ${best.score}, ${queue.activeCount}/${queue.wipLimit} active)`);
    }

    return { admitted, skipped, wipLimit: queue.wipLimit, activeCount: queue.activeCount };
  }

  private admit(queue: WorkQueue, item: WorkItem, now: number, agent?: string): void {
    if (queue.activeCount >= queue.wipLimit) {
      const error = new CapacityViolationError(queue.activeCount, queue.wipLimit);
      this.log.error(error.message);
      throw error;
    }
    const blocked = queue.blockedBy(item);
    if (blocked.length > 0) {
      const error = new DependencyViolationError(item.id, blocked);
      this.log.error(error.message);
      throw error;
    }
    queue.markActive(item, now, agent);
  }
}
