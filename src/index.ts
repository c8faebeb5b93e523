/**
 * nightshift - work coordination with an overnight execution window
 *
 * Features:
 * - WIP-bounded scheduling that favours work other work is waiting on
 * - Sync/async/flexible timing so unattended work moves to the night
 * - Per-tier daily budget with a held-back reserve
 * - Stall detection and adaptive concurrency
 * - Crash-safe JSON ledger under an advisory file lock
 */

export type { NightshiftConfig, TierConfig, QuotaConfig } from './config/schema';
export { defaultConfig, statePaths } from './config/schema';
export { loadConfig, parseConfig, mergeConfig, CONFIG_FILENAME } from './config/loader';
export { createLogger, silentLogger } from './logging';
export type { Logger } from './logging';
export * from './coordinator';

import type { NightshiftConfig } from './config/schema';
import { statePaths } from './config/schema';
import { loadConfig } from './config/loader';
import { createLogger } from './logging';
import { WorkCoordinator } from './coordinator/coordinator';
import { MetricsLog } from './coordinator/metrics-log';
import { ResultStore } from './coordinator/result-store';
import { FileLedgerStore } from './coordinator/state-store';

/**
 * Create a coordinator over the on-disk state described by `config`
 * (loaded from the usual places when omitted).
 */
export function createCoordinator(config: NightshiftConfig = loadConfig()): WorkCoordinator {
  const paths = statePaths(config);
  return new WorkCoordinator({
    config,
    store: new FileLedgerStore({
      statePath: paths.ledger,
      initialWipLimit: config.concurrency.initialWipLimit,
      lockStaleMs: config.storage.lockStaleMs,
      lockRetries: config.storage.lockRetries,
      log: createLogger('Ledger'),
    }),
    metrics: new MetricsLog(paths.metrics),
    results: new ResultStore(paths.results),
    log: createLogger('Scheduler'),
  });
}
