export type WorkStatus = 'queued' | 'active' | 'completed' | 'failed' | 'permanently_failed';
export type WorkTiming = 'sync' | 'async' | 'flexible';

export interface WorkItem {
  id: string;
  description: string;
  priority: number;
  complexity: number;
  dependencies: string[];
  status: WorkStatus;
  timing: WorkTiming;
  deferred: boolean;
  tier: string;
  estimatedQuota: number;
  estimatedDuration: number;  // minutes
  retryCount: number;
  createdAt: number;
  enqueuedAt: number;
  seq: number;
  startedAt: number | null;
  scheduledFor: number | null;
  notBefore: number | null;
  completedAt: number | null;
  resultLocation: string | null;
  agent: string | null;
  lastError: string | null;
}

export interface WorkInput {
  id?: string;
  description: string;
  priority?: number;
  complexity?: number;
  dependencies?: string[];
  timing?: WorkTiming;
  tier?: string;
  estimatedQuota?: number;
  estimatedDuration?: number;
  scheduledFor?: number;
}

export interface QuotaTierState {
  used: number;
  periodStart: number;
}

export interface OvernightRecord {
  id: string;
  runId: string;
  completedAt: number;
  resultLocation: string | null;
}

export interface OvernightRunSummary {
  runId: string;
  startedAt: number;
  endedAt: number;
  completed: string[];
  retried: string[];
  permanentlyFailed: string[];
  skipped: string[];
  requeuedAtClose: string[];
  reportLocation: string | null;
}

export interface LedgerState {
  version: 1;
  wipLimit: number;
  nextSeq: number;
  queued: WorkItem[];
  active: WorkItem[];
  completed: WorkItem[];
  failed: WorkItem[];
  completedOvernight: OvernightRecord[];
  quota: Record<string, QuotaTierState>;
  lastOvernightRun: OvernightRunSummary | null;
  updatedAt: number;
}

export type SkipReason = 'quota' | 'time' | 'period';

export interface SkippedItem {
  id: string;
  reason: SkipReason;
  detail: string;
}

export interface ScheduleResult {
  admitted: WorkItem[];
  skipped: SkippedItem[];
  wipLimit: number;
  activeCount: number;
}

export type FailOutcome =
  | { kind: 'retry'; item: WorkItem; retryCount: number; notBefore: number | null; scheduled: WorkItem[] }
  | { kind: 'permanent'; item: WorkItem; reason: string; scheduled: WorkItem[] };

export interface CompleteOutcome {
  item: WorkItem;
  alreadyCompleted: boolean;
  scheduled: WorkItem[];
}

export interface StallReport {
  id: string;
  description: string;
  startedAt: number;
  elapsedMinutes: number;
  agent: string | null;
}

export type ConcurrencyMode = 'focus' | 'balanced' | 'throughput';

export interface ConcurrencyDecision {
  mode: ConcurrencyMode;
  wipLimit: number;
  previousWipLimit: number;
  stallRate: number;
  completionRate: number;
}

export interface QuotaTierSummary {
  tier: string;
  used: number;
  limit: number | null;
  effectiveLimit: number | null;
  usable: number | null;
  percent: number;
  resetsAt: number;
}

export interface ForecastEntry {
  id: string;
  tier: string;
  estimatedQuota: number;
  score: number;
}

export interface TierForecast {
  tier: string;
  usable: number | null;
  requested: number;
  admitted: number;
}

export interface ForecastReport {
  windowStart: number;
  windowEnd: number;
  fits: ForecastEntry[];
  deferred: ForecastEntry[];
  tiers: TierForecast[];
}

export interface QueuedSummary {
  id: string;
  description: string;
  priority: number;
  score: number;
  timing: WorkTiming;
  deferred: boolean;
  eligible: boolean;
  blockedBy: string[];
  retryCount: number;
  scheduledFor: number | null;
}

export interface ActiveSummary {
  id: string;
  description: string;
  startedAt: number;
  elapsedMinutes: number;
  agent: string | null;
}

export interface FailureSummary {
  id: string;
  description: string;
  reason: string;
  retryCount: number;
}

export interface StatusSummary {
  wipLimit: number;
  counts: Record<'queued' | 'active' | 'completed' | 'permanentlyFailed', number>;
  active: ActiveSummary[];
  queued: QueuedSummary[];
  stalled: StallReport[];
  permanentFailures: FailureSummary[];
  quota: QuotaTierSummary[];
  lastOvernightRun: OvernightRunSummary | null;
  inActiveHours: boolean;
  warnings: string[];
}
