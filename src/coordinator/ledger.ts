import { z } from 'zod';
import { StateCorruptionError } from './errors';
import type { LedgerState, WorkItem, WorkStatus } from './types';

const TimestampSchema = z.number().int().nonnegative();

export const WorkItemSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  priority: z.number().int().min(1).max(10),
  complexity: z.number().int().min(1).max(10),
  dependencies: z.array(z.string()),
  status: z.enum(['queued', 'active', 'completed', 'failed', 'permanently_failed']),
  timing: z.enum(['sync', 'async', 'flexible']),
  deferred: z.boolean(),
  tier: z.string().min(1),
  estimatedQuota: z.number().nonnegative(),
  estimatedDuration: z.number().nonnegative(),
  retryCount: z.number().int().nonnegative(),
  createdAt: TimestampSchema,
  enqueuedAt: TimestampSchema,
  seq: z.number().int().nonnegative(),
  startedAt: TimestampSchema.nullable(),
  scheduledFor: TimestampSchema.nullable(),
  notBefore: TimestampSchema.nullable(),
  completedAt: TimestampSchema.nullable(),
  resultLocation: z.string().nullable(),
  agent: z.string().nullable(),
  lastError: z.string().nullable(),
});

const OvernightRunSummarySchema = z.object({
  runId: z.string(),
  startedAt: TimestampSchema,
  endedAt: TimestampSchema,
  completed: z.array(z.string()),
  retried: z.array(z.string()),
  permanentlyFailed: z.array(z.string()),
  skipped: z.array(z.string()),
  requeuedAtClose: z.array(z.string()),
  reportLocation: z.string().nullable(),
});

export const LedgerStateSchema = z.object({
  version: z.literal(1),
  wipLimit: z.number().int().min(1),
  nextSeq: z.number().int().nonnegative(),
  queued: z.array(WorkItemSchema),
  active: z.array(WorkItemSchema),
  completed: z.array(WorkItemSchema),
  failed: z.array(WorkItemSchema),
  completedOvernight: z.array(
    z.object({
      id: z.string(),
      runId: z.string(),
      completedAt: TimestampSchema,
      resultLocation: z.string().nullable(),
    }),
  ),
  quota: z.record(
    z.string(),
    z.object({
      used: z.number().nonnegative(),
      periodStart: TimestampSchema,
    }),
  ),
  lastOvernightRun: OvernightRunSummarySchema.nullable(),
  updatedAt: TimestampSchema,
});

const BUCKET_STATUS: Record<'queued' | 'active' | 'completed' | 'failed', WorkStatus> = {
  queued: 'queued',
  active: 'active',
  completed: 'completed',
  failed: 'permanently_failed',
};

export function createEmptyLedger(wipLimit: number, now: number): LedgerState {
  return {
    version: 1,
    wipLimit,
    nextSeq: 0,
    queued: [],
    active: [],
    completed: [],
    failed: [],
    completedOvernight: [],
    quota: {},
    lastOvernightRun: null,
    updatedAt: now,
  };
}

export function allItems(state: LedgerState): WorkItem[] {
  return [...state.queued, ...state.active, ...state.completed, ...state.failed];
}

/**
 * Parse and check a ledger read from disk. Anything structurally wrong or
 * violating the bucket/status or id invariants is a StateCorruptionError;
 * nothing is repaired here.
 */
export function parseLedger(raw: string, statePath: string): LedgerState {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new StateCorruptionError(statePath, 'invalid JSON', error);
  }

  const result = LedgerStateSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') || '<root>' : '<root>';
    throw new StateCorruptionError(statePath, `${where}: ${issue?.message ?? 'schema mismatch'}`, result.error);
  }

  const state: LedgerState = result.data;
  const problem = findInvariantViolation(state);
  if (problem) {
    throw new StateCorruptionError(statePath, problem);
  }
  return state;
}

export function findInvariantViolation(state: LedgerState): string | null {
  const seen = new Set<string>();
  for (const bucket of ['queued', 'active', 'completed', 'failed'] as const) {
    for (const item of state[bucket]) {
      if (seen.has(item.id)) return `duplicate work id ${item.id}`;
      seen.add(item.id);
      if (item.status !== BUCKET_STATUS[bucket]) {
        return `item ${item.id} has status ${item.status} but is stored under ${bucket}`;
      }
    }
  }

  for (const item of allItems(state)) {
    for (const dep of item.dependencies) {
      if (!seen.has(dep)) return `item ${item.id} depends on unknown id ${dep}`;
    }
  }
  return null;
}

export function serializeLedger(state: LedgerState): string {
  return JSON.stringify(state, null, 2);
}
