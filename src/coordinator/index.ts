export type * from './types';
export * from './errors';
export { WorkQueue } from './work-queue';
export type { WorkDraft } from './work-queue';
export { Scheduler } from './scheduler';
export type { AdmissionPolicy, AdmissionVerdict, ScoredItem } from './scheduler';
export { StallMonitor } from './stall-monitor';
export { ConcurrencyController } from './concurrency-controller';
export type { ExecutionStats } from './concurrency-controller';
export { TemporalClassifier, DEFAULT_TIMING_RULES, DEFAULT_TIER_RULES, keywordMatcher, stemMatcher } from './temporal-classifier';
export type { TimingRule, TierRule } from './temporal-classifier';
export { QuotaLedger } from './quota-ledger';
export { FileLedgerStore, MemoryLedgerStore } from './state-store';
export type { LedgerStore } from './state-store';
export { createEmptyLedger, parseLedger } from './ledger';
export { MetricsLog } from './metrics-log';
export { ResultStore } from './result-store';
export type { WorkResult } from './result-store';
export { WorkCoordinator } from './coordinator';
export type { CoordinatorOptions, CompleteOptions, FailOptions, CloseOptions, CloseOutcome, ClassificationReport } from './coordinator';
export { DeferredExecutor, retryBackoffMs } from './deferred-executor';
export type { WorkRunner, RunnerResult, RunOptions } from './deferred-executor';
export { CommandWorker } from './command-worker';
export { OvernightDaemon } from './daemon';
export { currentWindow, nextWindow, isWithin } from './time-window';
export type { WindowBounds } from './time-window';
