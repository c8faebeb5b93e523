import type { StallReport, WorkItem } from './types';

const MINUTE = 60 * 1000;

export class StallMonitor {
  private thresholdMs: number;

  constructor(thresholdMinutes: number = 60) {
    this.thresholdMs = thresholdMinutes * MINUTE;
  }

  get threshold(): number {
    return this.thresholdMs;
  }

  isStalled(item: WorkItem, now: number, thresholdMs: number = this.thresholdMs): boolean {
    if (item.status !== 'active' || item.startedAt === null) return false;
    return now - item.startedAt > thresholdMs;
  }

  /** Active items running longer than the threshold. Advisory only; nothing changes state. */
  findStalled(active: WorkItem[], now: number, thresholdMs: number = this.thresholdMs): StallReport[] {
    return active
      .filter((item) => this.isStalled(item, now, thresholdMs))
      .map((item) => ({
        id: item.id,
        description: item.description,
        startedAt: item.startedAt ?? now,
        elapsedMinutes: Math.floor((now - (item.startedAt ?? now)) / MINUTE),
        agent: item.agent,
      }))
      .sort((a, b) => a.startedAt - b.startedAt);
  }
}
