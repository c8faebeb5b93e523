import { EventEmitter } from 'events';
import type { Logger } from '../logging';
import { createLogger } from '../logging';
import type { WorkCoordinator } from './coordinator';
import type { DeferredExecutor } from './deferred-executor';
import { currentWindow, msUntilNextStart } from './time-window';

/**
 * Long-running process: fires the overnight run when the execution window
 * opens and keeps the WIP limit adapted on a fixed cadence in between.
 */
export class OvernightDaemon extends EventEmitter {
  private running = false;
  private runTimer: NodeJS.Timeout | null = null;
  private adaptTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly coordinator: WorkCoordinator,
    private readonly executor: DeferredExecutor,
    private readonly log: Logger = createLogger('Daemon'),
  ) {
    super();
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    const intervalMs = this.coordinator.config.concurrency.adaptIntervalMinutes * 60 * 1000;
    this.adaptTimer = setInterval(() => {
      void this.adapt();
    }, intervalMs);

    const window = this.coordinator.config.executionWindow;
    if (currentWindow(this.coordinator.clock(), window)) {
      this.log.info('Started inside the execution window');
      void this.runOnce();
    } else {
      this.armNextRun();
    }
    this.emit('started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.runTimer) {
      clearTimeout(this.runTimer);
      this.runTimer = null;
    }
    if (this.adaptTimer) {
      clearInterval(this.adaptTimer);
      this.adaptTimer = null;
    }
    if (this.executor.running) {
      this.log.info('Closing the current run...');
      try {
        await this.executor.stop();
      } catch (error) {
        this.log.error('Run failed during shutdown:', error);
      }
    }
    this.emit('stopped');
    this.log.info('Stopped');
  }

  private armNextRun(): void {
    if (!this.running) return;
    const delay = msUntilNextStart(this.coordinator.clock(), this.coordinator.config.executionWindow);
    this.log.info(`Next run in ${Math.round(delay / 60000)} minutes`);
    this.runTimer = setTimeout(() => {
      this.runTimer = null;
      void this.runOnce();
    }, delay);
  }

  /** Never rejects; outcomes are reported through events and the log. */
  private async runOnce(): Promise<void> {
    try {
      const summary = await this.executor.run();
      this.emit('run', summary);
    } catch (error) {
      this.log.error('Overnight run failed:', error);
      this.emit('runError', error);
    } finally {
      this.armNextRun();
    }
  }

  private async adapt(): Promise<void> {
    try {
      await this.coordinator.adaptConcurrency();
    } catch (error) {
      this.log.error('Concurrency adaptation failed:', error);
    }
  }
}
