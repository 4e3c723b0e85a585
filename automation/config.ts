/**
 * Configuration: environment (loaded from .env by the CLIs) overridden by
 * `--key=value` flags. Pure over the env object and argv it is given.
 *
 * Flags:
 *   --headless=true|false   (default: false, login needs a visible window)
 *   --no-db                 skip the Postgres sink even if DATABASE_URL is set
 *   --dir=<path>            snapshot directory
 *   --port=<n>              dashboard port
 *   --seed=<value>          projection seed
 *   --sims=<n>              projection trials
 */

import fs from 'fs';
import path from 'path';
import { ConfigError } from './errors';
import {
  AUTH_STATE_PATH,
  BACKOFF_MS,
  CANCEL_TICK_MS,
  CONTESTS_FILE,
  DEFAULT_LOGIN_URL,
  INITIAL_LOAD_DELAY,
  MAX_SCROLL_ATTEMPTS,
  POLL_INTERVAL_MS,
  REFRESH_SETTLE_MS,
  SCROLL_SETTLE_MS,
  SNAPSHOT_DIR,
  TABLE_LOAD_TIMEOUT,
} from './selectors';

export interface SchedulerTimings {
  pollIntervalMs: number;
  refreshSettleMs: number;
  backoffMs: number;
  tickMs: number;
}

export interface CollectorSettings {
  scrollSettleMs: number;
  maxScrollIterations: number;
}

export interface ProjectionSettings {
  sigma2PerMinute: number;
  scoringRatePerMinute: number;
  sims: number;
  seed?: string;
}

export interface TrackerConfig {
  headless: boolean;
  loginUrl: string;
  contestsFile: string;
  authStatePath: string;
  snapshotDir: string;
  initialLoadDelayMs: number;
  tableLoadTimeoutMs: number;
  databaseUrl?: string;
  port: number;
  timings: SchedulerTimings;
  collector: CollectorSettings;
  projection: ProjectionSettings;
}

type Env = Record<string, string | undefined>;

function parseFlags(argv: readonly string[]): Env {
  const flags: Env = {};
  for (const arg of argv) {
    if (!arg.startsWith('--')) continue;
    const eqIdx = arg.indexOf('=');
    if (eqIdx === -1) {
      flags[arg.slice(2)] = 'true';
    } else {
      flags[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    }
  }
  return flags;
}

function numberSetting(
  name: string,
  raw: string | undefined,
  fallback: number,
  opts: { min?: number; integer?: boolean } = {}
): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  if (opts.integer && !Number.isInteger(n)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  if (opts.min !== undefined && n < opts.min) {
    throw new ConfigError(`${name} must be >= ${opts.min}, got ${n}`);
  }
  return n;
}

export function loadConfig(env: Env = process.env, argv: readonly string[] = []): TrackerConfig {
  const flags = parseFlags(argv);
  const ms = (name: string, fallback: number, min = 0) =>
    numberSetting(name, env[name], fallback, { min, integer: true });

  return {
    headless: (flags['headless'] ?? env.HEADLESS ?? 'false') === 'true',
    loginUrl: env.LOGIN_URL || DEFAULT_LOGIN_URL,
    contestsFile: path.resolve(env.CONTESTS_FILE || CONTESTS_FILE),
    authStatePath: path.resolve(env.AUTH_STATE_PATH || AUTH_STATE_PATH),
    snapshotDir: path.resolve(flags['dir'] || env.SNAPSHOT_DIR || SNAPSHOT_DIR),
    initialLoadDelayMs: ms('INITIAL_LOAD_DELAY_MS', INITIAL_LOAD_DELAY),
    tableLoadTimeoutMs: ms('TABLE_LOAD_TIMEOUT_MS', TABLE_LOAD_TIMEOUT),
    databaseUrl: flags['no-db'] === 'true' ? undefined : env.DATABASE_URL || undefined,
    port: numberSetting('PORT', flags['port'] ?? env.PORT, 3000, { min: 0, integer: true }),
    timings: {
      pollIntervalMs: ms('POLL_INTERVAL_MS', POLL_INTERVAL_MS),
      refreshSettleMs: ms('REFRESH_SETTLE_MS', REFRESH_SETTLE_MS),
      backoffMs: ms('BACKOFF_MS', BACKOFF_MS),
      tickMs: ms('CANCEL_TICK_MS', CANCEL_TICK_MS, 1),
    },
    collector: {
      scrollSettleMs: ms('SCROLL_SETTLE_MS', SCROLL_SETTLE_MS),
      maxScrollIterations: ms('MAX_SCROLL_ITERATIONS', MAX_SCROLL_ATTEMPTS, 1),
    },
    projection: {
      sigma2PerMinute: numberSetting('SIGMA2_PER_MINUTE', env.SIGMA2_PER_MINUTE, 0.5, { min: 0 }),
      scoringRatePerMinute: numberSetting('SCORING_RATE_PER_MINUTE', env.SCORING_RATE_PER_MINUTE, 0.25),
      sims: numberSetting('SIMS', flags['sims'] ?? env.SIMS, 20_000, { min: 1, integer: true }),
      seed: flags['seed'] ?? env.PROJECTION_SEED,
    },
  };
}

/** The contest URL: first non-empty line of the target file. */
export function readTargetUrl(file: string): string {
  if (!fs.existsSync(file)) {
    throw new ConfigError(`Target config not found: ${file}`);
  }

  const line = fs
    .readFileSync(file, 'utf-8')
    .split(/\r?\n/)
    .map(l => l.trim())
    .find(l => l.length > 0);

  if (!line) {
    throw new ConfigError(`Target config is empty: ${file}`);
  }

  try {
    return new URL(line).toString();
  } catch {
    throw new ConfigError(`Target config does not start with a URL: "${line}"`);
  }
}
