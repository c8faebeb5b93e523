import { afterEach, describe, expect, it, vi } from 'vitest';
import { silentLogger } from '../logging';
import { OvernightDaemon } from './daemon';
import { DeferredExecutor } from './deferred-executor';
import { EVENING, memoryCoordinator, MORNING, TestClock } from './fixtures';
import type { OvernightRunSummary } from './types';

function setup(at: number) {
  const clock = new TestClock(at);
  const { coordinator } = memoryCoordinator({ clock });
  const executor = new DeferredExecutor(coordinator, { run: async () => ({ output: 'ok' }) }, { pollIntervalMs: 5 }, silentLogger);
  const daemon = new OvernightDaemon(coordinator, executor, silentLogger);
  return { coordinator, daemon };
}

describe('OvernightDaemon', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should run at once when started inside the window', async () => {
    const { coordinator, daemon } = setup(EVENING);
    await coordinator.addWork({ id: 'a', description: 'scan the logs' });

    const ran = new Promise<OvernightRunSummary>((resolve) => daemon.once('run', resolve));
    daemon.start();
    const summary = await ran;
    await daemon.stop();

    expect(summary.completed).toEqual(['a']);
    expect(daemon.isRunning).toBe(false);
  });

  it('should wait for the window when started outside it', async () => {
    vi.useFakeTimers();
    const { daemon } = setup(MORNING);
    const onRun = vi.fn();
    daemon.on('run', onRun);

    daemon.start();
    expect(daemon.isRunning).toBe(true);
    expect(vi.getTimerCount()).toBe(2);

    await daemon.stop();
    expect(vi.getTimerCount()).toBe(0);
    expect(onRun).not.toHaveBeenCalled();
  });

  it('should ignore a second start', async () => {
    vi.useFakeTimers();
    const { daemon } = setup(MORNING);
    const onStarted = vi.fn();
    daemon.on('started', onStarted);

    daemon.start();
    daemon.start();
    expect(onStarted).toHaveBeenCalledTimes(1);
    await daemon.stop();
  });
});
