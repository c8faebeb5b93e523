import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { silentLogger } from '../logging';
import { WorkCoordinator } from './coordinator';
import { StateCorruptionError, UnknownWorkError, ValidationError } from './errors';
import { EVENING, memoryCoordinator, MINUTE, MORNING, TestClock, testConfig } from './fixtures';
import { ResultStore } from './result-store';
import { FileLedgerStore } from './state-store';

const smallBudget = testConfig((config) => {
  config.quota.tiers.sonnet = { limit: 100, reserveFraction: 0.5 };
});

describe('WorkCoordinator', () => {
  let clock: TestClock;
  let coordinator: WorkCoordinator;

  beforeEach(() => {
    clock = new TestClock(MORNING);
    ({ coordinator } = memoryCoordinator({ clock, config: smallBudget, wipLimit: 2 }));
  });

  describe('addWork', () => {
    it('should start sync work straight away', async () => {
      const { item, scheduled } = await coordinator.addWork({ id: 'a', description: 'review the design doc' });
      expect(item.timing).toBe('sync');
      expect(item.deferred).toBe(false);
      expect(scheduled.map((entry) => entry.id)).toEqual(['a']);
      expect((await coordinator.getWork('a')).status).toBe('active');
    });

    it('should defer async work to the next execution window', async () => {
      const { item, scheduled } = await coordinator.addWork({ id: 'a', description: 'scan the logs for errors' });
      expect(item.timing).toBe('async');
      expect(item.deferred).toBe(true);
      expect(item.scheduledFor).toBe(new Date(2026, 9, 19, 22, 0).getTime());
      expect(scheduled).toEqual([]);
    });

    it('should run flexible work now during active hours when the tier has room', async () => {
      const { item, scheduled } = await coordinator.addWork({ id: 'a', description: 'write a short poem' });
      expect(item.timing).toBe('flexible');
      expect(item.deferred).toBe(false);
      expect(scheduled.map((entry) => entry.id)).toEqual(['a']);
    });

    it('should defer flexible work when the tier is out of budget', async () => {
      await coordinator.recordUsage('sonnet', 45);
      const { item } = await coordinator.addWork({ id: 'a', description: 'write a short poem', estimatedQuota: 10 });
      expect(item.deferred).toBe(true);
      expect(item.scheduledFor).toBe(new Date(2026, 9, 19, 22, 0).getTime());
    });

    it('should run flexible work on an unconfigured tier now', async () => {
      await coordinator.recordUsage('sonnet', 50);
      const { item } = await coordinator.addWork({ id: 'a', description: 'write a short poem', tier: 'local' });
      expect(item.deferred).toBe(false);
    });

    it('should defer flexible work outside active hours', async () => {
      clock.value = EVENING;
      const { item } = await coordinator.addWork({ id: 'a', description: 'write a short poem' });
      expect(item.deferred).toBe(true);
      expect(item.scheduledFor).toBe(new Date(2026, 9, 19, 22, 0).getTime());
    });

    it('should accept a scheduledFor inside the window and reject one outside', async () => {
      const inside = new Date(2026, 9, 19, 23, 30).getTime();
      const { item } = await coordinator.addWork({
        id: 'a',
        description: 'scan the logs',
        scheduledFor: inside,
      });
      expect(item.scheduledFor).toBe(inside);

      await expect(
        coordinator.addWork({ id: 'b', description: 'scan the logs', scheduledFor: MORNING }),
      ).rejects.toThrow(ValidationError);
    });

    it('should leave state unchanged on invalid input', async () => {
      await expect(coordinator.addWork({ id: 'a', description: 'review it', priority: 11 })).rejects.toThrow(
        'priority must be an integer between 1 and 10, got 11',
      );
      await expect(
        coordinator.addWork({ id: 'b', description: 'review it', dependencies: ['ghost'] }),
      ).rejects.toThrow('Work b depends on unknown id ghost');
      expect((await coordinator.statusSummary()).counts).toEqual({
        queued: 0,
        active: 0,
        completed: 0,
        permanentlyFailed: 0,
      });
    });

    it('should add a batch atomically', async () => {
      const { items, scheduled } = await coordinator.addBatch([
        { id: 'w1', description: 'review part one', priority: 8 },
        { id: 'w2', description: 'review part two', priority: 5 },
        { id: 'w3', description: 'review the whole', priority: 9, dependencies: ['w1'] },
      ]);
      expect(items.map((item) => item.id)).toEqual(['w1', 'w2', 'w3']);
      expect(scheduled.map((item) => item.id)).toEqual(['w1', 'w2']);

      await expect(coordinator.addBatch([])).rejects.toThrow('Batch is empty');
    });
  });

  describe('completeWork', () => {
    it('should admit the unblocked dependent ahead of plain work', async () => {
      await coordinator.addBatch([
        { id: 'w1', description: 'review part one', priority: 8 },
        { id: 'w2', description: 'review part two', priority: 5 },
        { id: 'w3', description: 'review the whole', priority: 9, dependencies: ['w1'] },
      ]);
      await coordinator.addWork({ id: 'w4', description: 'review the appendix', priority: 5 });

      const outcome = await coordinator.completeWork('w1');
      expect(outcome.alreadyCompleted).toBe(false);
      expect(outcome.scheduled.map((item) => item.id)).toEqual(['w3']);
      expect((await coordinator.getWork('w4')).status).toBe('queued');
    });

    it('should be idempotent', async () => {
      await coordinator.addWork({ id: 'a', description: 'review it' });
      await coordinator.completeWork('a');
      const again = await coordinator.completeWork('a');

      expect(again.alreadyCompleted).toBe(true);
      expect(again.scheduled).toEqual([]);
      expect((await coordinator.statusSummary()).counts.completed).toBe(1);
    });

    it('should reject work that is not active', async () => {
      await coordinator.addWork({ id: 'a', description: 'scan the logs' });
      await expect(coordinator.completeWork('a')).rejects.toThrow('Work a is queued; only active work can be completed');
      await expect(coordinator.completeWork('ghost')).rejects.toThrow(UnknownWorkError);
    });

    it('should record reported usage against the tier', async () => {
      await coordinator.addWork({ id: 'a', description: 'review it' });
      await coordinator.completeWork('a', { quotaUsed: 7, agent: 'agent-7' });
      const status = await coordinator.statusSummary();
      expect(status.quota.find((tier) => tier.tier === 'sonnet')?.used).toBe(7);
      expect((await coordinator.getWork('a')).agent).toBe('agent-7');
    });
  });

  describe('failWork', () => {
    it('should requeue until retries run out and then fail permanently', async () => {
      await coordinator.addWork({ id: 'a', description: 'review it' });

      const first = await coordinator.failWork('a', 'timeout');
      expect(first.kind).toBe('retry');
      expect(first.item.retryCount).toBe(1);
      expect(first.scheduled.map((item) => item.id)).toEqual(['a']);

      const second = await coordinator.failWork('a', 'timeout');
      expect(second.item.retryCount).toBe(2);

      const third = await coordinator.failWork('a', 'still broken');
      expect(third).toMatchObject({ kind: 'permanent', reason: 'still broken' });
      expect(third.item.status).toBe('permanently_failed');
      expect(third.item.retryCount).toBe(3);

      const after = await coordinator.failWork('a', 'again');
      expect(after).toMatchObject({ kind: 'permanent', reason: 'still broken', scheduled: [] });
      expect(after.item.retryCount).toBe(3);
      await expect(coordinator.completeWork('a')).rejects.toThrow(ValidationError);
    });

    it('should hold a requeued item back for the backoff period', async () => {
      await coordinator.addWork({ id: 'a', description: 'review it' });
      const outcome = await coordinator.failWork('a', 'rate limited', { backoffMs: 5 * MINUTE });
      expect(outcome).toMatchObject({ kind: 'retry', notBefore: MORNING + 5 * MINUTE, scheduled: [] });

      clock.advance(5 * MINUTE);
      const result = await coordinator.scheduleNext();
      expect(result.admitted.map((item) => item.id)).toEqual(['a']);
    });

    it('should requeue at the tail behind equal-priority work', async () => {
      await coordinator.setWipLimit(1);
      await coordinator.addWork({ id: 'a', description: 'review it' });
      clock.advance(1);
      await coordinator.addWork({ id: 'b', description: 'review that' });
      clock.advance(1);

      const outcome = await coordinator.failWork('a', 'flaky');
      expect(outcome.scheduled.map((item) => item.id)).toEqual(['b']);
    });

    it('should list permanent failures in the status summary', async () => {
      await coordinator.addWork({ id: 'a', description: 'review it' });
      for (let attempt = 0; attempt < 3; attempt++) {
        await coordinator.failWork('a', 'broken');
      }
      const status = await coordinator.statusSummary();
      expect(status.permanentFailures).toEqual([
        { id: 'a', description: 'review it', reason: 'broken', retryCount: 3 },
      ]);
      expect(status.warnings).toContain('1 item(s) failed permanently and need attention');
    });

    it('should require a reason', async () => {
      await expect(coordinator.failWork('a', ' ')).rejects.toThrow('A failure reason is required');
    });
  });

  describe('stalls and concurrency', () => {
    it('should report stalls and narrow to focus mode', async () => {
      await coordinator.addWork({ id: 'a', description: 'review it' });
      clock.advance(61 * MINUTE);

      const stalled = await coordinator.findStalled();
      expect(stalled.map((report) => [report.id, report.elapsedMinutes])).toEqual([['a', 61]]);
      expect((await coordinator.getWork('a')).status).toBe('active');

      const decision = await coordinator.adaptConcurrency();
      expect(decision).toMatchObject({ mode: 'focus', previousWipLimit: 2, wipLimit: 1, stallRate: 1 });
      expect((await coordinator.statusSummary()).wipLimit).toBe(1);
    });

    it('should not report work under the threshold', async () => {
      await coordinator.addWork({ id: 'a', description: 'review it' });
      clock.advance(59 * MINUTE);
      expect(await coordinator.findStalled()).toEqual([]);
    });

    it('should clamp operator WIP limits', async () => {
      expect(await coordinator.setWipLimit(10)).toBe(4);
      await expect(coordinator.setWipLimit(0)).rejects.toThrow(ValidationError);
    });
  });

  describe('forecast', () => {
    it('should fit what the budget allows in score order', async () => {
      await coordinator.addWork({ id: 'low', description: 'scan the logs', priority: 3, tier: 'sonnet', estimatedQuota: 30 });
      await coordinator.addWork({ id: 'high', description: 'scan the wiki', priority: 7, tier: 'sonnet', estimatedQuota: 30 });
      await coordinator.addWork({ id: 'now', description: 'review it', estimatedQuota: 30 });

      const report = await coordinator.forecast();
      expect(report.windowStart).toBe(new Date(2026, 9, 19, 22, 0).getTime());
      expect(report.fits.map((entry) => entry.id)).toEqual(['high']);
      expect(report.deferred.map((entry) => entry.id)).toEqual(['low']);
    });
  });

  it('should explain classifications', () => {
    expect(coordinator.classify('search for papers and then delete the old ones')).toEqual({
      timing: 'sync',
      rule: 'destructive',
      tier: 'sonnet',
    });
  });

  it('should warn about stalls and an exhausted tier in the status summary', async () => {
    await coordinator.addWork({ id: 'a', description: 'review it' });
    await coordinator.recordUsage('sonnet', 50);
    clock.advance(90 * MINUTE);

    const status = await coordinator.statusSummary();
    expect(status.active).toEqual([
      { id: 'a', description: 'review it', startedAt: MORNING, elapsedMinutes: 90, agent: null },
    ]);
    expect(status.inActiveHours).toBe(true);
    expect(status.warnings).toEqual([
      'a has been active for 90 minutes; check on it or fail it with reason "stalled"',
      'Tier sonnet has no usable budget left until the next reset',
    ]);
  });

  it('should reject negative usage', async () => {
    await expect(coordinator.recordUsage('sonnet', -1)).rejects.toThrow(ValidationError);
  });
});

describe('WorkCoordinator with result artifacts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nightshift-results-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the output and keep its location on the item', async () => {
    const clock = new TestClock(MORNING);
    const results = new ResultStore(dir);
    const { coordinator } = memoryCoordinator({ clock, results });
    await coordinator.addWork({ id: 'a', description: 'review it' });

    const outcome = await coordinator.completeWork('a', { output: { verdict: 'ok' }, agent: 'agent-1' });
    expect(outcome.item.resultLocation).toBe(join(dir, 'a.json'));
    expect(JSON.parse(await readFile(join(dir, 'a.json'), 'utf-8'))).toEqual({
      id: 'a',
      completedAt: MORNING,
      agent: 'agent-1',
      output: { verdict: 'ok' },
    });
    expect(await results.read(join(dir, 'a.json'))).toEqual({
      id: 'a',
      completedAt: MORNING,
      agent: 'agent-1',
      output: { verdict: 'ok' },
    });
  });

  it('should keep separate artifacts for ids that look alike', async () => {
    const clock = new TestClock(MORNING);
    const { coordinator } = memoryCoordinator({ clock, results: new ResultStore(dir) });
    await coordinator.addWork({ id: 'a/b', description: 'review it' });
    await coordinator.addWork({ id: 'a_b', description: 'review it' });

    const first = await coordinator.completeWork('a/b', { output: 'first' });
    const second = await coordinator.completeWork('a_b', { output: 'second' });

    expect(first.item.resultLocation).toBe(join(dir, 'a%2Fb.json'));
    expect(second.item.resultLocation).toBe(join(dir, 'a_b.json'));
    expect(JSON.parse(await readFile(join(dir, 'a%2Fb.json'), 'utf-8'))).toMatchObject({ id: 'a/b', output: 'first' });
  });
});

describe('WorkCoordinator on a file ledger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nightshift-ledger-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should refuse to schedule on a corrupt ledger until it is reset', async () => {
    const statePath = join(dir, 'ledger.json');
    await writeFile(statePath, '{ "queued": [');
    const now = () => MORNING;
    const coordinator = new WorkCoordinator({
      store: new FileLedgerStore({ statePath, initialWipLimit: 2, now }),
      config: testConfig(),
      log: silentLogger,
      now,
    });

    await expect(coordinator.addWork({ id: 'a', description: 'review it' })).rejects.toThrow(StateCorruptionError);

    expect(await coordinator.reset()).toBe(`${statePath}.corrupt-${MORNING}`);
    expect(await readFile(`${statePath}.corrupt-${MORNING}`, 'utf-8')).toBe('{ "queued": [');
    const { item } = await coordinator.addWork({ id: 'a', description: 'review it' });
    expect(item.status).toBe('active');
  });
});
