import type { ReelItem } from '../models';
import { Mutex } from '../lib/mutex';
import { systemClock, uniform, type Clock, type Random } from '../lib/clock';
import { createLogger, type Logger } from '../logger';
import { errorMessage } from '../errors';
import type { ContentSource } from './instagram';
import type { SlidingWindowLimiter } from './rateLimiter';
import { parseReels } from './parse';

export const BLOCKED = 'BLOCKED';

export type FetchResult = ReelItem[] | typeof BLOCKED;

export interface FetchPacing {
  delayMs: [number, number];
  idleChance: number;
  idleMs: [number, number];
}

const HARD_BLOCK_STATUSES = new Set([401, 403, 429]);

export function isBlocked(result: FetchResult): result is typeof BLOCKED {
  return result === BLOCKED;
}

/**
 * Single choke point for every request to the content source. Calls are
 * serialised, budgeted by the limiter and paced with random delays. A hard
 * block (401/403/429) is sticky until `reset()`.
 */
export class RateLimitedFetcher {
  private blocked = false;
  private readonly mutex = new Mutex();

  constructor(
    private readonly source: ContentSource,
    private readonly limiter: SlidingWindowLimiter,
    private readonly pacing: FetchPacing,
    private readonly clock: Clock = systemClock,
    private readonly random: Random = Math.random,
    private readonly log: Logger = createLogger('fetcher')
  ) {}

  get isBlocked(): boolean {
    return this.blocked;
  }

  // called at the start of every monitor run
  reset(): void {
    if (this.blocked) this.log.info('block_reset');
    this.blocked = false;
  }

  fetch(handle: string): Promise<FetchResult> {
    return this.mutex.runExclusive(async () => {
      if (this.blocked) return BLOCKED;

      await this.limiter.acquire();
      await this.clock.sleep(uniform(this.random, this.pacing.delayMs));

      let status: number;
      let body: string;
      try {
        ({ status, body } = await this.source.request(handle));
      } catch (err) {
        this.log.warn('fetch_failed', { handle, error: errorMessage(err) });
        return [];
      }

      if (HARD_BLOCK_STATUSES.has(status)) {
        this.blocked = true;
        this.log.error('source_blocked', { handle, status });
        return BLOCKED;
      }

      if (status < 200 || status >= 300) {
        this.log.warn('fetch_bad_status', { handle, status });
        return [];
      }

      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch (err) {
        this.log.warn('fetch_bad_json', { handle, error: errorMessage(err) });
        return [];
      }

      const items = parseReels(payload);
      this.log.debug('fetch_ok', { handle, items: items.length });

      if (this.random() < this.pacing.idleChance) {
        const idle = uniform(this.random, this.pacing.idleMs);
        this.log.info('idle_pause', { ms: Math.round(idle) });
        await this.clock.sleep(idle);
      }

      return items;
    });
  }
}
