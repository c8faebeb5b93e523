import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ResultStore } from './result-store';
import type { OvernightRunSummary } from './types';

describe('ResultStore', () => {
  let dir: string;
  let store: ResultStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nightshift-results-'));
    store = new ResultStore(join(dir, 'results'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write and read back a result', async () => {
    const location = await store.write({ id: 'w1', completedAt: 42, agent: 'agent-1', output: { lines: 3 } });

    expect(location).toBe(join(dir, 'results', 'w1.json'));
    expect(await store.read(location)).toEqual({ id: 'w1', completedAt: 42, agent: 'agent-1', output: { lines: 3 } });
  });

  it('should keep ids inside the results directory', () => {
    expect(store.pathFor('../etc/passwd')).toBe(join(dir, 'results', '..%2Fetc%2Fpasswd.json'));
  });

  it('should give ids that differ only in unsafe characters their own files', async () => {
    const slashed = await store.write({ id: 'a/b', completedAt: 1, agent: null, output: 'first' });
    const underscored = await store.write({ id: 'a_b', completedAt: 2, agent: null, output: 'second' });

    expect(slashed).not.toBe(underscored);
    expect((await store.read(slashed)).output).toBe('first');
    expect((await store.read(underscored)).output).toBe('second');
  });

  it('should write files readable by the owner only', async () => {
    const location = await store.write({ id: 'w1', completedAt: 1, agent: null, output: 'ok' });
    expect((await stat(location)).mode & 0o777).toBe(0o600);
  });

  it('should reject a malformed artifact', async () => {
    const location = await store.write({ id: 'w1', completedAt: 1, agent: null, output: null });
    await writeFile(location, JSON.stringify({ id: 'w1' }));
    await expect(store.read(location)).rejects.toThrow();
  });

  it('should write run reports under runs/', async () => {
    const summary: OvernightRunSummary = {
      runId: 'run_20261019T220500',
      startedAt: 1,
      endedAt: 2,
      completed: ['a'],
      retried: [],
      permanentlyFailed: [],
      skipped: [],
      requeuedAtClose: [],
      reportLocation: null,
    };

    const location = await store.writeRunReport(summary, { errors: [] });

    expect(location).toBe(join(dir, 'results', 'runs', 'run_20261019T220500.json'));
    const report = JSON.parse(await readFile(location, 'utf-8'));
    expect(report.reportLocation).toBe(location);
    expect(report.completed).toEqual(['a']);
    expect(report.details).toEqual({ errors: [] });
  });
});
