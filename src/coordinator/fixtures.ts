import type { NightshiftConfig } from '../config/schema';
import { defaultConfig } from '../config/schema';
import { WorkCoordinator } from './coordinator';
import { createEmptyLedger } from './ledger';
import { MetricsLog } from './metrics-log';
import type { ResultStore } from './result-store';
import { MemoryLedgerStore } from './state-store';
import type { WorkItem } from './types';
import type { WorkDraft } from './work-queue';

// Local wall-clock anchors shared by the tests.
export const EVENING = new Date(2026, 9, 19, 22, 5).getTime();
export const MORNING = new Date(2026, 9, 19, 10, 0).getTime();
export const MINUTE = 60 * 1000;

export function makeItem(overrides: Partial<WorkItem> & { id: string }): WorkItem {
  return {
    description: `work ${overrides.id}`,
    priority: 5,
    complexity: 5,
    dependencies: [],
    status: 'queued',
    timing: 'sync',
    deferred: false,
    tier: 'sonnet',
    estimatedQuota: 10,
    estimatedDuration: 30,
    retryCount: 0,
    createdAt: 0,
    enqueuedAt: 0,
    seq: 0,
    startedAt: null,
    scheduledFor: null,
    notBefore: null,
    completedAt: null,
    resultLocation: null,
    agent: null,
    lastError: null,
    ...overrides,
  };
}

export function makeDraft(overrides: Partial<WorkDraft> = {}): WorkDraft {
  return {
    description: 'tidy the notes',
    priority: 5,
    complexity: 5,
    dependencies: [],
    timing: 'sync',
    deferred: false,
    tier: 'sonnet',
    estimatedQuota: 10,
    estimatedDuration: 30,
    scheduledFor: null,
    ...overrides,
  };
}

export function testConfig(edit?: (config: NightshiftConfig) => void): NightshiftConfig {
  const config = structuredClone(defaultConfig);
  config.storage.stateDir = '/nonexistent/nightshift-test';
  edit?.(config);
  return config;
}

/** A settable clock. */
export class TestClock {
  constructor(public value: number) {}

  readonly now = (): number => this.value;

  advance(ms: number): void {
    this.value += ms;
  }
}

export interface MemoryCoordinatorOptions {
  clock: TestClock;
  config?: NightshiftConfig;
  wipLimit?: number;
  results?: ResultStore;
}

export function memoryCoordinator(options: MemoryCoordinatorOptions): {
  coordinator: WorkCoordinator;
  store: MemoryLedgerStore;
  metrics: MetricsLog;
} {
  const config = options.config ?? testConfig();
  const store = new MemoryLedgerStore(
    createEmptyLedger(options.wipLimit ?? config.concurrency.initialWipLimit, options.clock.value),
  );
  const metrics = new MetricsLog();
  const coordinator = new WorkCoordinator({
    store,
    config,
    metrics,
    results: options.results ?? null,
    now: options.clock.now,
  });
  return { coordinator, store, metrics };
}
