import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from '../coordinator/errors';
import { isClock } from '../coordinator/time-window';
import type { NightshiftConfig } from './schema';
import { defaultConfig } from './schema';

export const CONFIG_FILENAME = 'nightshift.json';

const Clock = z.string().refine(isClock, { message: 'expected HH:mm' });
const PositiveInt = z.number().int().positive();
const Fraction = z.number().min(0).max(1);

const UserConfigSchema = z
  .object({
    $schema: z.string(),
    concurrency: z
      .object({
        initialWipLimit: PositiveInt,
        minWip: PositiveInt,
        maxWip: PositiveInt,
        focusWip: PositiveInt,
        balancedWip: PositiveInt,
        throughputWip: PositiveInt,
        focusStallRate: Fraction,
        throughputStallRate: Fraction,
        throughputCompletionsPerHour: z.number().nonnegative(),
        metricsWindowHours: z.number().positive(),
        adaptIntervalMinutes: z.number().positive(),
      })
      .strict()
      .partial(),
    scheduling: z
      .object({
        unblockWeight: z.number().nonnegative(),
        maxRetries: PositiveInt,
        stallThresholdMinutes: z.number().positive(),
        retryBackoff: z
          .object({ baseMinutes: z.number().nonnegative(), maxMinutes: z.number().nonnegative() })
          .strict()
          .partial(),
      })
      .strict()
      .partial(),
    activeHours: z.object({ start: Clock, end: Clock }).strict().partial(),
    executionWindow: z
      .object({
        start: Clock,
        end: Clock,
        maxRunMinutes: z.number().positive(),
        pollIntervalSeconds: z.number().positive(),
      })
      .strict()
      .partial(),
    quota: z
      .object({
        tiers: z.record(
          z.object({ limit: z.number().nonnegative().nullable(), reserveFraction: Fraction }).strict(),
        ),
        resetHour: z.number().int().min(0).max(23),
        defaultTier: z.string().min(1),
      })
      .strict()
      .partial(),
    storage: z
      .object({
        stateDir: z.string().min(1),
        lockStaleMs: PositiveInt,
        lockRetries: z.number().int().nonnegative(),
      })
      .strict()
      .partial(),
    worker: z
      .object({
        command: z.array(z.string().min(1)).min(1),
        timeoutMinutes: z.number().positive(),
      })
      .strict()
      .partial(),
  })
  .strict()
  .partial();

export type UserConfig = z.infer<typeof UserConfigSchema>;

function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

/**
 * Deep merge user config with defaults. Tiers given by the user replace the
 * default table entirely so a removed tier stays removed.
 */
export function mergeConfig(defaults: NightshiftConfig, user: UserConfig): NightshiftConfig {
  const merged: NightshiftConfig = {
    ...defaults,
    concurrency: { ...defaults.concurrency, ...user.concurrency },
    scheduling: {
      ...defaults.scheduling,
      ...user.scheduling,
      retryBackoff: { ...defaults.scheduling.retryBackoff, ...user.scheduling?.retryBackoff },
    },
    activeHours: { ...defaults.activeHours, ...user.activeHours },
    executionWindow: { ...defaults.executionWindow, ...user.executionWindow },
    quota: {
      tiers: user.quota?.tiers ?? defaults.quota.tiers,
      resetHour: user.quota?.resetHour ?? defaults.quota.resetHour,
      defaultTier: user.quota?.defaultTier ?? defaults.quota.defaultTier,
    },
    storage: { ...defaults.storage, ...user.storage },
    worker: { ...defaults.worker, ...user.worker },
  };
  if (user.$schema !== undefined) merged.$schema = user.$schema;
  merged.storage.stateDir = expandHome(merged.storage.stateDir);
  return merged;
}

/** Cross-field rules the per-field schema cannot express. */
export function checkConfig(config: NightshiftConfig): NightshiftConfig {
  const { concurrency, quota, scheduling } = config;
  if (concurrency.minWip > concurrency.maxWip) {
    throw new ConfigError(`concurrency.minWip (${concurrency.minWip}) exceeds maxWip (${concurrency.maxWip})`);
  }
  if (concurrency.focusStallRate < concurrency.throughputStallRate) {
    throw new ConfigError('concurrency.focusStallRate must not be below throughputStallRate');
  }
  if (!(quota.defaultTier in quota.tiers)) {
    throw new ConfigError(`quota.defaultTier "${quota.defaultTier}" is not one of the configured tiers`);
  }
  if (scheduling.retryBackoff.baseMinutes > scheduling.retryBackoff.maxMinutes) {
    throw new ConfigError('scheduling.retryBackoff.baseMinutes exceeds maxMinutes');
  }
  return config;
}

export function parseConfig(raw: unknown, source: string): NightshiftConfig {
  const result = UserConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid config at ${source}: ${issues.join('; ')}`, result.error);
  }
  return checkConfig(mergeConfig(defaultConfig, result.data));
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load configuration from the first config file found, or use defaults.
 * NIGHTSHIFT_STATE_DIR overrides storage.stateDir.
 */
export function loadConfig(workspaceDir?: string, env: NodeJS.ProcessEnv = process.env): NightshiftConfig {
  const searchPaths = [
    ...(workspaceDir ? [join(workspaceDir, CONFIG_FILENAME)] : []),
    join(process.cwd(), CONFIG_FILENAME),
    join(homedir(), '.config', 'nightshift', CONFIG_FILENAME),
  ];

  let config = defaultConfig;
  for (const configPath of searchPaths) {
    let content: string;
    try {
      content = readFileSync(configPath, 'utf-8');
    } catch (error) {
      if (isMissing(error)) continue;
      throw new ConfigError(`Could not read config at ${configPath}`, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Config at ${configPath} is not valid JSON`, error);
    }
    config = parseConfig(raw, configPath);
    break;
  }

  const stateDir = env.NIGHTSHIFT_STATE_DIR;
  if (stateDir) {
    return { ...config, storage: { ...config.storage, stateDir: expandHome(stateDir) } };
  }
  return config;
}
