import 'dotenv/config';
import { ConfigError } from './errors';

export type ContentSourceKind = 'instagram' | 'mock';
export type NotifierKind = 'telegram' | 'console';

export interface SnapshotPolicy {
  retention: number;
  minViewDelta: number;
  maxIntervalHours: number;
}

export interface PrunePolicy {
  missingThreshold: number;
  hardStaleDays: number;
  maxInactiveDays: number;
  minViewsPerHour: number;
  maxReelAgeDays: number;
  minTotalViews: number;
}

export interface FetchPolicy {
  maxRequests: number;
  windowMs: number;
  jitterMs: [number, number];
  delayMs: [number, number];
  idleChance: number;
  idleMs: [number, number];
}

export interface AppConfig {
  env: string;
  port: number;
  dbFile: string;
  contentSource: ContentSourceKind;
  notifier: NotifierKind;
  telegramBotToken?: string;
  projectId?: string;
  monitorCron: string;
  deliveryCron: string;
  fetch: FetchPolicy;
  snapshots: SnapshotPolicy;
  prune: PrunePolicy;
}

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < min || String(value) !== raw) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function textVar(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = textVar(env, name)?.toLowerCase();
  if (!raw) return fallback;
  const match = allowed.find((candidate) => candidate === raw);
  if (!match) throw new ConfigError(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  return match;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const mode = textVar(env, 'ENV') ?? 'dev';
  const prod = mode === 'prod';

  const config: AppConfig = {
    env: mode,
    port: intVar(env, 'PORT', 3000, 1),
    dbFile: textVar(env, 'DB_FILE') ?? 'data/db.json',
    contentSource: oneOf(env, 'CONTENT_SOURCE', ['instagram', 'mock'] as const, 'instagram'),
    notifier: oneOf(env, 'NOTIFIER', ['telegram', 'console'] as const, 'telegram'),
    telegramBotToken: textVar(env, 'TELEGRAM_BOT_TOKEN'),
    projectId: textVar(env, 'PROJECT_ID'),
    monitorCron: textVar(env, 'MONITOR_CRON') ?? '0 */3 * * *',
    deliveryCron: textVar(env, 'DELIVERY_CRON') ?? '*/15 * * * *',
    fetch: {
      maxRequests: intVar(env, 'RATE_LIMIT_MAX_REQUESTS', 120, 1),
      windowMs: intVar(env, 'RATE_LIMIT_WINDOW_MS', 60 * 60 * 1000, 1),
      jitterMs: [1_000, 5_000],
      // dev runs are interactive, keep them short
      delayMs: prod ? [6_000, 10_000] : [1_500, 3_000],
      idleChance: prod ? 0.05 : 0,
      idleMs: [20_000, 60_000]
    },
    snapshots: {
      retention: intVar(env, 'SNAPSHOT_RETENTION', 6, 2),
      minViewDelta: intVar(env, 'MIN_VIEW_DELTA', 20),
      maxIntervalHours: intVar(env, 'MAX_SNAPSHOT_INTERVAL_HOURS', 6, 1)
    },
    prune: {
      missingThreshold: intVar(env, 'MISSING_THRESHOLD', 3, 1),
      hardStaleDays: intVar(env, 'HARD_STALE_DAYS', 3, 1),
      maxInactiveDays: intVar(env, 'MAX_INACTIVE_DAYS', 2, 1),
      minViewsPerHour: intVar(env, 'MIN_VIEWS_PER_HOUR', 5),
      maxReelAgeDays: intVar(env, 'MAX_REEL_AGE_DAYS', 5, 1),
      minTotalViews: intVar(env, 'MIN_TOTAL_VIEWS', 100)
    }
  };

  if (config.notifier === 'telegram' && !config.telegramBotToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN is required when NOTIFIER=telegram');
  }

  return config;
}
