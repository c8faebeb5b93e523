/**
 * nightshift Configuration Schema
 * Defines scheduling, budget and overnight-window settings
 */

import { homedir } from 'os';
import { join } from 'path';

export interface TierConfig {
  limit: number | null;  // null = unlimited
  reserveFraction: number;  // Share of the limit held back for urgent work
}

export interface QuotaConfig {
  tiers: Record<string, TierConfig>;
  resetHour: number;  // Local hour at which usage renews
  defaultTier: string;
}

export interface ConcurrencyConfig {
  initialWipLimit: number;
  minWip: number;
  maxWip: number;
  focusWip: number;
  balancedWip: number;
  throughputWip: number;
  focusStallRate: number;  // Above this stall share → focus mode
  throughputStallRate: number;  // Below this stall share (with enough completions) → throughput mode
  throughputCompletionsPerHour: number;
  metricsWindowHours: number;
  adaptIntervalMinutes: number;
}

export interface SchedulingConfig {
  unblockWeight: number;
  maxRetries: number;
  stallThresholdMinutes: number;
  retryBackoff: {
    baseMinutes: number;
    maxMinutes: number;
  };
}

export interface ClockRange {
  start: string;  // HH:mm, local time
  end: string;  // HH:mm; may be earlier than start to wrap past midnight
}

export interface ExecutionWindowConfig extends ClockRange {
  maxRunMinutes: number;
  pollIntervalSeconds: number;
}

export interface StorageConfig {
  stateDir: string;
  lockStaleMs: number;
  lockRetries: number;
}

export interface WorkerConfig {
  command: string[];  // Description is appended as the last argument
  timeoutMinutes: number;
}

export interface NightshiftConfig {
  $schema?: string;
  concurrency: ConcurrencyConfig;
  scheduling: SchedulingConfig;
  activeHours: ClockRange;
  executionWindow: ExecutionWindowConfig;
  quota: QuotaConfig;
  storage: StorageConfig;
  worker: WorkerConfig;
}

export const DEFAULT_STATE_DIR = join(homedir(), '.nightshift');

export const defaultConfig: NightshiftConfig = {
  concurrency: {
    initialWipLimit: 3,
    minWip: 1,
    maxWip: 4,
    focusWip: 1,
    balancedWip: 3,
    throughputWip: 4,
    focusStallRate: 0.3,
    throughputStallRate: 0.1,
    throughputCompletionsPerHour: 2,
    metricsWindowHours: 4,
    adaptIntervalMinutes: 15,
  },

  scheduling: {
    unblockWeight: 2,
    maxRetries: 3,
    stallThresholdMinutes: 60,
    retryBackoff: {
      baseMinutes: 5,
      maxMinutes: 60,
    },
  },

  activeHours: {
    start: '09:00',
    end: '22:00',
  },

  executionWindow: {
    start: '22:00',
    end: '01:00',
    maxRunMinutes: 180,
    pollIntervalSeconds: 5,
  },

  quota: {
    tiers: {
      haiku: { limit: null, reserveFraction: 0 },
      sonnet: { limit: 1125, reserveFraction: 0.1 },
      opus: { limit: 250, reserveFraction: 0.2 },
    },
    resetHour: 0,
    defaultTier: 'sonnet',
  },

  storage: {
    stateDir: DEFAULT_STATE_DIR,
    lockStaleMs: 30000,
    lockRetries: 50,
  },

  worker: {
    command: ['claude', '--print'],
    timeoutMinutes: 60,
  },
};

export function statePaths(config: Pick<NightshiftConfig, 'storage'>): {
  ledger: string;
  results: string;
  metrics: string;
} {
  return {
    ledger: join(config.storage.stateDir, 'ledger.json'),
    results: join(config.storage.stateDir, 'results'),
    metrics: join(config.storage.stateDir, 'metrics.db'),
  };
}
