import { Mutex } from '../lib/mutex';
import { systemClock, uniform, type Clock, type Random } from '../lib/clock';

export interface RateLimitPolicy {
  maxRequests: number;
  windowMs: number;
  // extra wait once the window is full, drawn uniformly from this range
  jitterMs: [number, number];
}

/**
 * Sliding-window request budget. `acquire` parks the caller until a slot is
 * free, then stamps the request.
 */
export class SlidingWindowLimiter {
  private stamps: number[] = [];
  private readonly mutex = new Mutex();

  constructor(
    private readonly policy: RateLimitPolicy,
    private readonly clock: Clock = systemClock,
    private readonly random: Random = Math.random
  ) {}

  get used(): number {
    this.evict(this.clock.now());
    return this.stamps.length;
  }

  /** Returns how long the caller waited, in ms. */
  acquire(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      let now = this.clock.now();
      this.evict(now);

      let waited = 0;
      if (this.stamps.length >= this.policy.maxRequests) {
        waited = Math.max(0, this.stamps[0] + this.policy.windowMs - now) + uniform(this.random, this.policy.jitterMs);
        await this.clock.sleep(waited);
        now = this.clock.now();
        this.evict(now);
      }

      this.stamps.push(now);
      return waited;
    });
  }

  private evict(now: number): void {
    while (this.stamps.length > 0 && this.stamps[0] <= now - this.policy.windowMs) {
      this.stamps.shift();
    }
  }
}
