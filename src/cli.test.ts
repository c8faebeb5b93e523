import { beforeEach, describe, expect, it } from 'vitest';
import { createProgram } from './cli';
import type { WorkCoordinator } from './coordinator/coordinator';
import { UnknownWorkError, ValidationError } from './coordinator/errors';
import { memoryCoordinator, MORNING, TestClock } from './coordinator/fixtures';

describe('nightshift CLI', () => {
  let clock: TestClock;
  let coordinator: WorkCoordinator;
  let lines: string[];

  const cli = async (...args: string[]) => {
    lines = [];
    const program = createProgram({
      coordinator: () => coordinator,
      runner: () => ({ run: async () => ({ output: 'done' }) }),
      out: (line) => lines.push(line),
    });
    await program.parseAsync(['node', 'nightshift', ...args]);
    return lines;
  };

  beforeEach(() => {
    clock = new TestClock(MORNING);
    ({ coordinator } = memoryCoordinator({ clock }));
  });

  it('should queue and start sync work', async () => {
    expect(await cli('add', '--id', 'r1', 'review', 'the', 'draft')).toEqual(['Queued r1 (sync)', 'Started r1']);
    expect((await coordinator.getWork('r1')).status).toBe('active');
  });

  it('should defer batch work to the execution window', async () => {
    const [line] = await cli('add', '--id', 's1', '-p', '8', 'scan', 'the', 'logs');
    expect(line).toMatch(/^Queued s1 \(async, deferred to 2026-10-19T22:00:00/);
    expect((await coordinator.getWork('s1')).priority).toBe(8);
  });

  it('should pass dependencies and estimates through', async () => {
    await cli('add', '--id', 'a', 'review', 'a');
    await cli('add', '--id', 'b', '-d', 'a, ', '--quota', '12.5', '--duration', '45', '-t', 'sync', 'tidy', 'up');

    const item = await coordinator.getWork('b');
    expect(item.dependencies).toEqual(['a']);
    expect(item.estimatedQuota).toBe(12.5);
    expect(item.estimatedDuration).toBe(45);
    expect(item.status).toBe('queued');
  });

  it('should complete work and start what it unblocks', async () => {
    await cli('add', '--id', 'a', 'review', 'a');
    await cli('add', '--id', 'b', '-d', 'a', 'review', 'b');

    expect(await cli('complete', 'a', '--output', 'all good')).toEqual(['Completed a', 'Started b']);
    expect(await cli('complete', 'a')).toEqual(['a was already completed']);
  });

  it('should requeue a failed attempt', async () => {
    await cli('add', '--id', 'a', 'review', 'a');
    expect(await cli('fail', 'a', 'tests', 'broke')).toEqual(['Requeued a (attempt 1)', 'Started a']);
    expect((await coordinator.getWork('a')).lastError).toBe('tests broke');
  });

  it('should surface coordinator errors', async () => {
    await expect(cli('complete', 'ghost')).rejects.toThrow(UnknownWorkError);
    await cli('add', '--id', 's1', 'scan', 'the', 'logs');
    await expect(cli('complete', 's1')).rejects.toThrow(ValidationError);
  });

  it('should set the WIP limit', async () => {
    expect(await cli('wip', '2')).toEqual(['WIP limit is 2']);
  });

  it('should explain a classification', async () => {
    expect(await cli('classify', 'delete', 'the', 'old', 'branch')).toEqual([
      'sync (rule: destructive, tier: sonnet)',
    ]);
  });

  it('should record external usage', async () => {
    expect(await cli('usage', 'opus', '20')).toEqual(['opus: 20 used this period']);
  });

  it('should print a readable status', async () => {
    await cli('add', '--id', 'r1', 'review', 'the', 'draft');
    const output = await cli('status');

    expect(output.slice(0, 6)).toEqual([
      'WIP 1/3 | queued 0 | completed 0 | failed 0',
      'Active hours: yes',
      '',
      'Active:',
      '  r1  0m  review the draft',
      '',
    ]);
    expect(output).toContain('  haiku: unlimited');
  });

  it('should print status as JSON', async () => {
    await cli('add', '--id', 'r1', 'review', 'the', 'draft');
    const [json] = await cli('status', '--json');
    const status = JSON.parse(json);
    expect(status.counts).toEqual({ queued: 0, active: 1, completed: 0, permanentlyFailed: 0 });
    expect(status.wipLimit).toBe(3);
  });

  it('should refuse a daytime run without force', async () => {
    await cli('add', '--id', 's1', 'scan', 'the', 'logs');
    await expect(cli('run')).rejects.toThrow(ValidationError);

    expect(await cli('run', '--force')).toEqual([
      'Run run_20261019T100000: 1 completed, 0 retried, 0 failed, 0 skipped',
    ]);
    expect((await coordinator.getWork('s1')).status).toBe('completed');
  });
});
