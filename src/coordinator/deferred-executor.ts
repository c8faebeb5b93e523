import { format } from 'date-fns';
import { EventEmitter } from 'events';
import type { Logger } from '../logging';
import { createLogger } from '../logging';
import type { CloseOutcome, WorkCoordinator } from './coordinator';
import { ValidationError } from './errors';
import { currentWindow, nextWindow, quotaPeriodStart } from './time-window';
import type { FailOutcome, OvernightRunSummary, SkippedItem, WorkItem } from './types';

const MINUTE = 60 * 1000;

export interface RunnerResult {
  output?: unknown;
  quotaUsed?: number;
  agent?: string;
}

/** Executes one work item out of process; a rejection counts as a failed attempt. */
export interface WorkRunner {
  run(item: WorkItem): Promise<RunnerResult>;
}

export interface ExecutorConfig {
  pollIntervalMs: number;
  maxRunMs: number;
}

export interface RunOptions {
  /** Run outside the execution window, bounded by the run cap alone. */
  force?: boolean;
}

export interface RunReportDetails {
  skipped: SkippedItem[];
  errors: string[];
  windowEnd: number;
  deadline: number;
}

interface RunContext {
  runId: string;
  windowEnd: number;
  deadline: number;
  periodStart: number;
  closed: boolean;
  inflight: Map<string, Promise<void>>;
  completed: string[];
  retried: string[];
  permanentlyFailed: string[];
  skipped: Map<string, SkippedItem>;
  errors: string[];
}

export function retryBackoffMs(attempt: number, baseMinutes: number, maxMinutes: number): number {
  return Math.min(baseMinutes * 2 ** Math.max(0, attempt - 1), maxMinutes) * MINUTE;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sleep(ms: number): { done: Promise<void>; cancel: () => void } {
  let timer: NodeJS.Timeout | null = null;
  const done = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, Math.max(0, ms));
  });
  return {
    done,
    cancel: () => {
      if (timer) clearTimeout(timer);
    },
  };
}

/**
 * Overnight runner. Admits deferred work through the coordinator under the
 * run's time and quota bounds, hands it to a WorkRunner and reports the
 * outcome back, until the deadline or until nothing is left to do.
 */
export class DeferredExecutor extends EventEmitter {
  private config: ExecutorConfig;
  private current: Promise<OvernightRunSummary> | null = null;
  private stopRequested = false;

  constructor(
    private readonly coordinator: WorkCoordinator,
    private readonly runner: WorkRunner,
    config?: Partial<ExecutorConfig>,
    private readonly log: Logger = createLogger('Executor'),
  ) {
    super();
    const window = coordinator.config.executionWindow;
    this.config = {
      pollIntervalMs: config?.pollIntervalMs ?? window.pollIntervalSeconds * 1000,
      maxRunMs: config?.maxRunMs ?? window.maxRunMinutes * MINUTE,
    };
  }

  get running(): boolean {
    return this.current !== null;
  }

  /** Starts a run, or joins the one already in progress. */
  run(options: RunOptions = {}): Promise<OvernightRunSummary> {
    if (!this.current) {
      this.current = this.execute(options).finally(() => {
        this.current = null;
      });
    }
    return this.current;
  }

  /** Closes the current run early, requeueing whatever is still running. */
  async stop(): Promise<OvernightRunSummary | null> {
    if (!this.current) return null;
    this.stopRequested = true;
    return this.current;
  }

  private async execute(options: RunOptions): Promise<OvernightRunSummary> {
    this.stopRequested = false;
    const startedAt = this.coordinator.clock();
    const windowConfig = this.coordinator.config.executionWindow;
    const window = currentWindow(startedAt, windowConfig);
    if (!window && !options.force) {
      throw new ValidationError(
        `Outside the execution window ${windowConfig.start}-${windowConfig.end}; pass force to run anyway`,
      );
    }

    const bounds = window ?? nextWindow(startedAt, windowConfig);
    const deadline = window
      ? Math.min(startedAt + this.config.maxRunMs, window.end)
      : startedAt + this.config.maxRunMs;

    const run: RunContext = {
      runId: `run_${format(startedAt, "yyyyMMdd'T'HHmmss")}`,
      windowEnd: bounds.end,
      deadline,
      periodStart: quotaPeriodStart(startedAt, this.coordinator.config.quota.resetHour),
      closed: false,
      inflight: new Map(),
      completed: [],
      retried: [],
      permanentlyFailed: [],
      skipped: new Map(),
      errors: [],
    };

    this.emit('runStart', run.runId);
    this.log.info(`Run ${run.runId} started, deadline ${new Date(deadline).toISOString()}`);

    await this.loop(run);

    run.closed = true;
    const open = [...run.inflight.keys()];
    const windowClosed = this.coordinator.clock() >= run.deadline;
    const closed: CloseOutcome =
      open.length > 0
        ? await this.coordinator.requeueAtClose(open, windowClosed ? 'window closed' : 'run stopped', {
            spendRetry: windowClosed,
          })
        : { requeued: [], permanentlyFailed: [] };
    const requeuedAtClose = closed.requeued;
    run.permanentlyFailed.push(...closed.permanentlyFailed);
    if (open.length > 0) {
      this.log.warn(
        `Run closed with ${open.length} item(s) still running; ${requeuedAtClose.length} requeued for the next cycle`,
      );
    }

    const summary: OvernightRunSummary = {
      runId: run.runId,
      startedAt,
      endedAt: this.coordinator.clock(),
      completed: run.completed,
      retried: run.retried,
      permanentlyFailed: run.permanentlyFailed,
      skipped: [...run.skipped.keys()].filter((id) => !run.completed.includes(id)),
      requeuedAtClose,
      reportLocation: null,
    };

    const results = this.coordinator.results;
    if (results) {
      const details: RunReportDetails = {
        skipped: [...run.skipped.values()],
        errors: run.errors,
        windowEnd: run.windowEnd,
        deadline: run.deadline,
      };
      summary.reportLocation = await results.writeRunReport(summary, details);
    }
    await this.coordinator.recordRun(summary);

    this.emit('runComplete', summary);
    this.log.info(
      `Run ${run.runId} finished: ${summary.completed.length} completed, ${summary.retried.length} retried, ` +
        `${summary.permanentlyFailed.length} failed, ${summary.skipped.length} skipped`,
    );
    return summary;
  }

  private async loop(run: RunContext): Promise<void> {
    while (!this.stopRequested && this.coordinator.clock() < run.deadline) {
      const result = await this.coordinator.admitDeferred(run);
      for (const skip of result.skipped) {
        run.skipped.set(skip.id, skip);
      }
      for (const item of result.admitted) {
        run.skipped.delete(item.id);
        run.inflight.set(item.id, this.work(item, run));
      }

      if (run.inflight.size === 0 && !(await this.hasWaitingWork(run))) {
        return;
      }

      const now = this.coordinator.clock();
      const pause = sleep(Math.min(this.config.pollIntervalMs, run.deadline - now));
      await Promise.race([pause.done, ...run.inflight.values()]);
      pause.cancel();
    }
  }

  /**
   * Whether due deferred work is still queued that a later pass could admit:
   * held back by the WIP limit, open dependencies or a backoff that ends
   * before the deadline. Items this run already skipped do not count, nor do
   * items waiting on one that can no longer complete tonight.
   */
  private async hasWaitingWork(run: RunContext): Promise<boolean> {
    const state = await this.coordinator.read();
    const dead = new Set([...state.failed.map((item) => item.id), ...run.skipped.keys()]);
    return state.queued.some(
      (item) =>
        item.deferred &&
        (item.scheduledFor === null || item.scheduledFor <= run.windowEnd) &&
        !run.skipped.has(item.id) &&
        (item.notBefore === null || item.notBefore < run.deadline) &&
        !item.dependencies.some((dep) => dead.has(dep)),
    );
  }

  private async work(item: WorkItem, run: RunContext): Promise<void> {
    this.emit('workStart', item);
    this.log.info(`Starting ${item.id}: ${item.description}`);

    try {
      let result: RunnerResult;
      try {
        result = await this.runner.run(item);
      } catch (error) {
        await this.reportFailure(item, run, describe(error));
        return;
      }
      await this.reportSuccess(item, run, result);
    } catch (error) {
      const message = `Could not record outcome of ${item.id}: ${describe(error)}`;
      run.errors.push(message);
      this.log.error(message);
    } finally {
      run.inflight.delete(item.id);
    }
  }

  private async reportSuccess(item: WorkItem, run: RunContext, result: RunnerResult): Promise<void> {
    if (run.closed) {
      this.log.warn(`Ignoring late result for ${item.id}; it was requeued at window close`);
      return;
    }
    const outcome = await this.coordinator.completeWork(item.id, {
      output: result.output,
      agent: result.agent,
      quotaUsed: result.quotaUsed,
      runId: run.runId,
    });
    if (outcome.alreadyCompleted) {
      this.log.info(`${item.id} was completed outside the run; not counting it`);
      return;
    }
    run.completed.push(item.id);
    this.emit('workComplete', item, result);
  }

  private async reportFailure(item: WorkItem, run: RunContext, reason: string): Promise<void> {
    if (run.closed) {
      this.log.warn(`Ignoring late failure for ${item.id}; it was requeued at window close`);
      return;
    }
    const { baseMinutes, maxMinutes } = this.coordinator.config.scheduling.retryBackoff;
    const outcome: FailOutcome = await this.coordinator.failWork(item.id, reason, {
      backoffMs: retryBackoffMs(item.retryCount + 1, baseMinutes, maxMinutes),
    });
    if (outcome.kind === 'retry') {
      if (!run.retried.includes(item.id)) run.retried.push(item.id);
    } else {
      run.permanentlyFailed.push(item.id);
    }
    this.emit('workFailed', item, outcome);
    this.log.error(`Failed ${item.id}: ${reason}`);
  }
}
