import type { AppConfig } from './config';
import { openDb } from './db';
import { LowdbStore, type Store } from './store';
import { systemClock, type Clock } from './lib/clock';
import { SlidingWindowLimiter } from './social/rateLimiter';
import { RateLimitedFetcher } from './social/fetcher';
import { createContentSource, createNotifier } from './social/providers';
import type { Notifier } from './social/telegram';

// Everything a job needs; built once per process and shared by CLI, API and scheduler.
export interface JobContext {
  store: Store;
  fetcher: RateLimitedFetcher;
  notifier: Notifier;
  config: Pick<AppConfig, 'snapshots' | 'prune'>;
  clock: Clock;
}

export function createContext(config: AppConfig): JobContext {
  const clock = systemClock;
  const limiter = new SlidingWindowLimiter(
    { maxRequests: config.fetch.maxRequests, windowMs: config.fetch.windowMs, jitterMs: config.fetch.jitterMs },
    clock
  );
  return {
    store: new LowdbStore(openDb(config.dbFile)),
    fetcher: new RateLimitedFetcher(createContentSource(config), limiter, config.fetch, clock),
    notifier: createNotifier(config),
    config,
    clock
  };
}
