import type { NightshiftConfig } from '../config/schema';
import { defaultConfig } from '../config/schema';
import type { Logger } from '../logging';
import { silentLogger } from '../logging';
import { ConcurrencyController } from './concurrency-controller';
import { ValidationError } from './errors';
import { MetricsLog } from './metrics-log';
import { QuotaLedger } from './quota-ledger';
import type { ResultStore } from './result-store';
import type { AdmissionPolicy } from './scheduler';
import { Scheduler } from './scheduler';
import { StallMonitor } from './stall-monitor';
import type { LedgerStore } from './state-store';
import { TemporalClassifier } from './temporal-classifier';
import { isWithin, nextWindow } from './time-window';
import type { WindowBounds } from './time-window';
import type {
  CompleteOutcome,
  ConcurrencyDecision,
  FailOutcome,
  ForecastReport,
  LedgerState,
  OvernightRunSummary,
  ScheduleResult,
  StallReport,
  StatusSummary,
  WorkInput,
  WorkItem,
  WorkTiming,
} from './types';
import type { WorkDraft } from './work-queue';
import { WorkQueue } from './work-queue';

const MINUTE = 60 * 1000;

const DEFAULT_PRIORITY = 5;
const DEFAULT_COMPLEXITY = 5;
const DEFAULT_QUOTA_ESTIMATE = 10;
const DEFAULT_DURATION_ESTIMATE = 30;

export interface CloseOptions {
  /** Count the cut-off attempt against the item's retries. */
  spendRetry?: boolean;
}

export interface CloseOutcome {
  requeued: string[];
  permanentlyFailed: string[];
}

export interface CoordinatorOptions {
  store: LedgerStore;
  config?: NightshiftConfig;
  classifier?: TemporalClassifier;
  metrics?: MetricsLog;
  results?: ResultStore | null;
  log?: Logger;
  now?: () => number;
}

export interface AddOutcome {
  items: WorkItem[];
  scheduled: WorkItem[];
}

export interface CompleteOptions {
  output?: unknown;
  agent?: string;
  quotaUsed?: number;
  /** Set by the overnight runner; the estimate was already reserved at admission. */
  runId?: string;
}

export interface FailOptions {
  backoffMs?: number;
}

export interface ClassificationReport {
  timing: WorkTiming;
  rule: string;
  tier: string;
}

/** Bounds the overnight runner passes to each admission pass. */
export interface OvernightAdmission {
  runId: string;
  windowEnd: number;
  deadline: number;
  periodStart: number;
}

interface Admitted {
  result: ScheduleResult;
  overnight: boolean;
}

/**
 * Operations over the persisted ledger. Every mutating call is one store
 * transaction: the queue, scheduler and quota ledger work on the draft and a
 * thrown error discards it.
 */
export class WorkCoordinator {
  readonly config: NightshiftConfig;
  readonly scheduler: Scheduler;
  readonly stallMonitor: StallMonitor;
  readonly controller: ConcurrencyController;
  readonly classifier: TemporalClassifier;
  private store: LedgerStore;
  private metrics: MetricsLog;
  readonly results: ResultStore | null;
  private log: Logger;
  private now: () => number;

  constructor(options: CoordinatorOptions) {
    this.store = options.store;
    this.config = options.config ?? defaultConfig;
    this.log = options.log ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.metrics = options.metrics ?? new MetricsLog();
    this.results = options.results ?? null;
    this.classifier = options.classifier ?? new TemporalClassifier({ defaultTier: this.config.quota.defaultTier });
    this.scheduler = new Scheduler({ unblockWeight: this.config.scheduling.unblockWeight }, this.log);
    this.stallMonitor = new StallMonitor(this.config.scheduling.stallThresholdMinutes);
    this.controller = new ConcurrencyController(this.config.concurrency);
  }

  clock(): number {
    return this.now();
  }

  async addWork(input: WorkInput): Promise<{ item: WorkItem; scheduled: WorkItem[] }> {
    const { items, scheduled } = await this.addBatch([input]);
    return { item: items[0], scheduled };
  }

  async addBatch(inputs: WorkInput[]): Promise<AddOutcome> {
    if (inputs.length === 0) {
      throw new ValidationError('Batch is empty');
    }
    const now = this.now();
    const { items, admitted } = await this.store.transact((state) => {
      const quota = this.quotaLedger(state, now);
      const queue = new WorkQueue(state);
      const items = queue.addMany(
        inputs.map((input) => this.resolveDraft(input, quota, now)),
        now,
      );
      return { items, admitted: this.scheduleDaytime(queue, now) };
    });

    for (const item of items) {
      this.log.info(
        `Queued ${item.id} (${item.timing}${item.deferred ? ', deferred' : ''}, tier ${item.tier}, priority ${item.priority})`,
      );
    }
    this.recordStarts(admitted, now);
    return { items, scheduled: admitted.result.admitted };
  }

  async scheduleNext(): Promise<ScheduleResult> {
    const now = this.now();
    const admitted = await this.store.transact((state) => this.scheduleDaytime(new WorkQueue(state), now));
    this.recordStarts(admitted, now);
    return admitted.result;
  }

  async completeWork(id: string, options: CompleteOptions = {}): Promise<CompleteOutcome> {
    const now = this.now();
    const resultLocation = this.results ? this.results.pathFor(id) : null;

    const { outcome, admitted } = await this.store.transact((state) => {
      const queue = new WorkQueue(state);
      const item = queue.require(id);
      if (item.status === 'completed') {
        return { outcome: { item, alreadyCompleted: true, scheduled: [] }, admitted: null };
      }
      if (item.status !== 'active') {
        throw new ValidationError(`Work ${id} is ${item.status}; only active work can be completed`);
      }

      if (options.agent) item.agent = options.agent;
      queue.markCompleted(item, now, options.output === undefined ? null : resultLocation);

      if (options.quotaUsed !== undefined) {
        const quota = this.quotaLedger(state, now);
        const extra = options.runId ? options.quotaUsed - item.estimatedQuota : options.quotaUsed;
        quota.recordUsage(item.tier, extra);
      }
      if (options.runId) {
        state.completedOvernight.push({
          id: item.id,
          runId: options.runId,
          completedAt: now,
          resultLocation: item.resultLocation,
        });
      }

      const admitted = this.scheduleDaytime(queue, now);
      return { outcome: { item, alreadyCompleted: false, scheduled: admitted.result.admitted }, admitted };
    });

    if (outcome.alreadyCompleted) {
      this.log.debug(`Work ${id} was already completed`);
      return outcome;
    }

    if (this.results && options.output !== undefined) {
      await this.results.write({ id, completedAt: now, agent: outcome.item.agent, output: options.output });
    }
    this.metrics.recordFinish(id, now, 'completed');
    this.log.info(`Completed ${id}`);
    if (admitted) this.recordStarts(admitted, now);
    return outcome;
  }

  async failWork(id: string, reason: string, options: FailOptions = {}): Promise<FailOutcome> {
    if (reason.trim() === '') {
      throw new ValidationError('A failure reason is required');
    }
    const backoffMs = options.backoffMs ?? 0;
    if (!Number.isFinite(backoffMs) || backoffMs < 0) {
      throw new ValidationError(`backoffMs must be a non-negative number, got ${backoffMs}`);
    }
    const now = this.now();
    const maxRetries = this.config.scheduling.maxRetries;

    const { outcome, admitted } = await this.store.transact((state) => {
      const queue = new WorkQueue(state);
      const item = queue.require(id);
      if (item.status === 'permanently_failed') {
        const outcome: FailOutcome = { kind: 'permanent', item, reason: item.lastError ?? reason, scheduled: [] };
        return { outcome, admitted: null };
      }
      if (item.status !== 'active') {
        throw new ValidationError(`Work ${id} is ${item.status}; only active work can be failed`);
      }

      item.status = 'failed';
      item.retryCount += 1;
      let outcome: FailOutcome;
      if (item.retryCount >= maxRetries) {
        queue.markPermanentlyFailed(item, now, reason);
        outcome = { kind: 'permanent', item, reason, scheduled: [] };
      } else {
        const notBefore = backoffMs > 0 ? now + Math.ceil(backoffMs) : null;
        queue.requeue(item, now, reason, notBefore);
        outcome = { kind: 'retry', item, retryCount: item.retryCount, notBefore, scheduled: [] };
      }

      const admitted = this.scheduleDaytime(queue, now);
      outcome.scheduled = admitted.result.admitted;
      return { outcome, admitted };
    });

    if (!admitted) {
      this.log.debug(`Work ${id} had already failed permanently`);
      return outcome;
    }

    this.metrics.recordFinish(id, now, 'failed', reason);
    if (outcome.kind === 'permanent') {
      this.log.warn(`Work ${id} failed permanently after ${outcome.item.retryCount} attempts: ${reason}`);
    } else {
      this.log.info(`Work ${id} failed (attempt ${outcome.retryCount}/${maxRetries}), requeued: ${reason}`);
    }
    this.recordStarts(admitted, now);
    return outcome;
  }

  async findStalled(thresholdMinutes?: number): Promise<StallReport[]> {
    const now = this.now();
    const state = await this.store.read();
    const thresholdMs = thresholdMinutes === undefined ? this.stallMonitor.threshold : thresholdMinutes * MINUTE;
    const stalled = this.stallMonitor.findStalled(state.active, now, thresholdMs);
    for (const report of stalled) {
      if (this.metrics.markStalled(report.id, now)) {
        this.log.warn(`Work ${report.id} has been active for ${report.elapsedMinutes} minutes`);
      }
    }
    return stalled;
  }

  async adaptConcurrency(): Promise<ConcurrencyDecision> {
    const now = this.now();
    await this.findStalled();
    const stats = this.metrics.windowStats(now, this.config.concurrency.metricsWindowHours);
    const decision = await this.store.transact((state) => {
      const decision = this.controller.decide(stats, state.wipLimit);
      state.wipLimit = decision.wipLimit;
      return decision;
    });
    if (decision.wipLimit !== decision.previousWipLimit) {
      this.log.info(
        `WIP limit ${decision.previousWipLimit} -> ${decision.wipLimit} (${decision.mode}, ` +
          `stall rate ${(decision.stallRate * 100).toFixed(0)}%, ${decision.completionRate.toFixed(1)} completions/h)`,
      );
    }
    return decision;
  }

  async setWipLimit(limit: number): Promise<number> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`WIP limit must be a positive integer, got ${limit}`);
    }
    const applied = this.controller.clamp(limit);
    await this.store.transact((state) => {
      state.wipLimit = applied;
    });
    if (applied !== limit) {
      this.log.warn(`WIP limit ${limit} clamped to ${applied}`);
    }
    return applied;
  }

  async recordUsage(tier: string, amount: number): Promise<number> {
    if (tier.trim() === '') {
      throw new ValidationError('Tier must not be empty');
    }
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ValidationError(`Usage must be a non-negative number, got ${amount}`);
    }
    const now = this.now();
    return this.store.transact((state) => this.quotaLedger(state, now).recordUsage(tier, amount));
  }

  async getWork(id: string): Promise<WorkItem> {
    const state = await this.store.read();
    return new WorkQueue(state).require(id);
  }

  classify(description: string): ClassificationReport {
    const { timing, rule } = this.classifier.explain(description);
    return { timing, rule, tier: this.classifier.estimateTier(description) };
  }

  async forecast(window?: WindowBounds): Promise<ForecastReport> {
    const now = this.now();
    const bounds = window ?? nextWindow(now, this.config.executionWindow);
    const state = await this.store.read();
    const queue = new WorkQueue(state);
    const pending = state.queued.filter((item) => this.isDueOvernight(item, bounds.end));
    const ranked = this.scheduler.rank(queue, pending).map(({ item, score }) => ({
      id: item.id,
      tier: item.tier,
      estimatedQuota: item.estimatedQuota,
      score,
    }));
    return this.quotaLedger(state, now).forecast(ranked, bounds);
  }

  async statusSummary(): Promise<StatusSummary> {
    const now = this.now();
    const state = await this.store.read();
    const queue = new WorkQueue(state);
    const completed = queue.completedIds();
    const quota = this.quotaLedger(state, now).summary();
    const stalled = this.stallMonitor.findStalled(state.active, now);

    const queued = this.scheduler.rank(queue, state.queued).map(({ item, score }) => ({
      id: item.id,
      description: item.description,
      priority: item.priority,
      score,
      timing: item.timing,
      deferred: item.deferred,
      eligible: queue.isEligible(item, now, completed),
      blockedBy: queue.blockedBy(item, completed),
      retryCount: item.retryCount,
      scheduledFor: item.scheduledFor,
    }));

    const warnings: string[] = [];
    for (const report of stalled) {
      warnings.push(
        `${report.id} has been active for ${report.elapsedMinutes} minutes; check on it or fail it with reason "stalled"`,
      );
    }
    for (const tier of quota) {
      if (tier.limit !== null && tier.usable === 0) {
        warnings.push(`Tier ${tier.tier} has no usable budget left until the next reset`);
      }
    }
    if (state.failed.length > 0) {
      warnings.push(`${state.failed.length} item(s) failed permanently and need attention`);
    }

    return {
      wipLimit: state.wipLimit,
      counts: {
        queued: state.queued.length,
        active: state.active.length,
        completed: state.completed.length,
        permanentlyFailed: state.failed.length,
      },
      active: state.active.map((item) => ({
        id: item.id,
        description: item.description,
        startedAt: item.startedAt ?? now,
        elapsedMinutes: Math.floor((now - (item.startedAt ?? now)) / MINUTE),
        agent: item.agent,
      })),
      queued,
      stalled,
      permanentFailures: state.failed.map((item) => ({
        id: item.id,
        description: item.description,
        reason: item.lastError ?? 'unknown',
        retryCount: item.retryCount,
      })),
      quota,
      lastOvernightRun: state.lastOvernightRun,
      inActiveHours: isWithin(now, this.config.activeHours),
      warnings,
    };
  }

  /** Moves an unreadable ledger aside so scheduling can start over. */
  async reset(): Promise<string | null> {
    const moved = await this.store.quarantine();
    if (moved) {
      this.log.warn(`Ledger reset; previous state kept at ${moved}`);
    }
    return moved;
  }

  /** One overnight admission pass: deferred work only, gated by run time and quota. */
  async admitDeferred(run: OvernightAdmission): Promise<ScheduleResult> {
    const now = this.now();
    const admitted = await this.store.transact((state) => {
      const quota = this.quotaLedger(state, now);
      const policy: AdmissionPolicy = {
        include: (item) => this.isDueOvernight(item, run.windowEnd),
        check: (item) => {
          if (quota.periodStart !== run.periodStart) {
            return { admit: false, reason: 'period', detail: 'budget period rolled over during the run' };
          }
          const finishesAt = now + item.estimatedDuration * MINUTE;
          if (finishesAt > run.deadline) {
            return {
              admit: false,
              reason: 'time',
              detail: `needs ${item.estimatedDuration} minutes, ${Math.max(0, Math.floor((run.deadline - now) / MINUTE))} left`,
            };
          }
          if (quota.wouldExceed(item.tier, item.estimatedQuota)) {
            return {
              admit: false,
              reason: 'quota',
              detail: `tier ${item.tier} has ${Math.max(0, quota.usable(item.tier))} usable, ${item.estimatedQuota} needed`,
            };
          }
          return { admit: true };
        },
        onAdmit: (item) => {
          quota.recordUsage(item.tier, item.estimatedQuota);
        },
        agent: `overnight-${run.runId}`,
      };
      return { result: this.scheduler.scheduleNext(new WorkQueue(state), now, policy), overnight: true };
    });
    this.recordStarts(admitted, now);
    return admitted.result;
  }

  /**
   * Settles run items still active when the run closes. At window close they
   * count as stalled and spend a retry like any failed attempt, so work that
   * always overruns ends up permanently failed; an early stop requeues them
   * as they were. Their workers' later reports are not accepted.
   */
  async requeueAtClose(ids: string[], reason: string, options: CloseOptions = {}): Promise<CloseOutcome> {
    const now = this.now();
    const maxRetries = this.config.scheduling.maxRetries;
    const outcome = await this.store.transact((state) => {
      const queue = new WorkQueue(state);
      const closed: CloseOutcome = { requeued: [], permanentlyFailed: [] };
      for (const id of ids) {
        const item = queue.get(id);
        if (!item || item.status !== 'active') continue;
        if (options.spendRetry) {
          item.retryCount += 1;
          if (item.retryCount >= maxRetries) {
            queue.markPermanentlyFailed(item, now, reason);
            closed.permanentlyFailed.push(id);
            continue;
          }
        }
        queue.requeue(item, now, reason, null);
        closed.requeued.push(id);
      }
      return closed;
    });

    if (options.spendRetry) {
      for (const id of [...outcome.requeued, ...outcome.permanentlyFailed]) {
        this.metrics.markStalled(id, now);
      }
    }
    for (const id of outcome.requeued) {
      this.metrics.recordFinish(id, now, 'requeued', reason);
    }
    for (const id of outcome.permanentlyFailed) {
      this.metrics.recordFinish(id, now, 'failed', reason);
      this.log.warn(`Work ${id} failed permanently after ${maxRetries} attempts: ${reason}`);
    }
    return outcome;
  }

  async recordRun(summary: OvernightRunSummary): Promise<void> {
    await this.store.transact((state) => {
      state.lastOvernightRun = summary;
    });
  }

  async read(): Promise<LedgerState> {
    return this.store.read();
  }

  private quotaLedger(state: LedgerState, now: number): QuotaLedger {
    return new QuotaLedger(state.quota, { tiers: this.config.quota.tiers, resetHour: this.config.quota.resetHour }, now);
  }

  private isDueOvernight(item: WorkItem, windowEnd: number): boolean {
    return item.deferred && (item.scheduledFor === null || item.scheduledFor <= windowEnd);
  }

  private scheduleDaytime(queue: WorkQueue, now: number): Admitted {
    return { result: this.scheduler.scheduleNext(queue, now, { include: (item) => !item.deferred }), overnight: false };
  }

  private recordStarts(admitted: Admitted, now: number): void {
    for (const item of admitted.result.admitted) {
      this.metrics.recordStart(item.id, now, admitted.overnight);
    }
  }

  private resolveDraft(input: WorkInput, quota: QuotaLedger, now: number): WorkDraft {
    const description = input.description;
    const timing = input.timing ?? this.classifier.classify(description);
    const tier = input.tier ?? this.classifier.estimateTier(description);
    if (tier.trim() === '') {
      throw new ValidationError('Tier must not be empty');
    }
    const estimatedQuota = input.estimatedQuota ?? DEFAULT_QUOTA_ESTIMATE;
    const window = this.config.executionWindow;

    let deferred: boolean;
    if (timing === 'sync') {
      deferred = false;
    } else if (timing === 'async') {
      deferred = true;
    } else {
      const runNow = isWithin(now, this.config.activeHours) && !quota.wouldExceed(tier, estimatedQuota);
      deferred = !runNow;
    }

    let scheduledFor: number | null = null;
    if (deferred) {
      if (input.scheduledFor !== undefined) {
        if (!Number.isInteger(input.scheduledFor) || !isWithin(input.scheduledFor, window)) {
          throw new ValidationError(
            `scheduledFor ${input.scheduledFor} is not a time inside the execution window ${window.start}-${window.end}`,
          );
        }
        scheduledFor = input.scheduledFor;
      } else {
        scheduledFor = nextWindow(now, window).start;
      }
    }

    return {
      id: input.id,
      description,
      priority: input.priority ?? DEFAULT_PRIORITY,
      complexity: input.complexity ?? DEFAULT_COMPLEXITY,
      dependencies: input.dependencies ?? [],
      timing,
      deferred,
      tier,
      estimatedQuota,
      estimatedDuration: input.estimatedDuration ?? DEFAULT_DURATION_ESTIMATE,
      scheduledFor,
    };
  }
}
