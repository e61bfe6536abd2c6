import type { Clock } from './lib/clock';
import type { JobContext } from './context';
import type { SnapshotPolicy, PrunePolicy } from './config';
import type { ContentSource, SourceResponse } from './social/instagram';
import type { Notifier } from './social/telegram';
import { memoryDb } from './db';
import { LowdbStore } from './store';
import { SlidingWindowLimiter } from './social/rateLimiter';
import { RateLimitedFetcher } from './social/fetcher';
import { DeliveryError } from './errors';
import type { ReelItem } from './models';

export const T0 = Date.UTC(2024, 0, 15, 12, 0, 0);

export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public current = T0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function profileBody(items: Array<Partial<ReelItem> & { code: string }>): string {
  const edges = items.map((item) => ({
    node: {
      is_video: true,
      shortcode: item.code,
      play_count: item.views ?? 0,
      edge_liked_by: { count: item.likes ?? 0 },
      edge_media_to_comment: { count: item.comments ?? 0 },
      edge_media_to_caption: { edges: item.caption ? [{ node: { text: item.caption } }] : [] }
    }
  }));
  return JSON.stringify({ data: { user: { edge_owner_to_timeline_media: { edges } } } });
}

export const reelUrl = (code: string) => `https://www.instagram.com/reel/${code}/`;

// Scripted responses per handle; the last one repeats.
export class FakeSource implements ContentSource {
  readonly requests: string[] = [];
  private readonly scripts = new Map<string, Array<SourceResponse | Error>>();

  respond(handle: string, ...responses: Array<SourceResponse | Error>): this {
    this.scripts.set(handle, responses);
    return this;
  }

  async request(handle: string): Promise<SourceResponse> {
    this.requests.push(handle);
    const script = this.scripts.get(handle) ?? [];
    const next = script.length > 1 ? script.shift() : script[0];
    if (next === undefined) return { status: 404, body: '' };
    if (next instanceof Error) throw next;
    return next;
  }
}

export class RecordingNotifier implements Notifier {
  readonly sent: Array<{ destination: string; message: string }> = [];
  failFor = new Set<string>();

  async send(destination: string, message: string): Promise<void> {
    if (this.failFor.has(destination)) throw new DeliveryError('telegram-send-failed: status 502');
    this.sent.push({ destination, message });
  }
}

export const snapshotPolicy: SnapshotPolicy = { retention: 6, minViewDelta: 20, maxIntervalHours: 6 };

export const prunePolicy: PrunePolicy = {
  missingThreshold: 3,
  hardStaleDays: 3,
  maxInactiveDays: 2,
  minViewsPerHour: 5,
  maxReelAgeDays: 5,
  minTotalViews: 100
};

export function testContext(options: { clock?: FakeClock; source?: ContentSource; notifier?: Notifier } = {}): JobContext & {
  clock: FakeClock;
} {
  const clock = options.clock ?? new FakeClock();
  const limiter = new SlidingWindowLimiter({ maxRequests: 100, windowMs: 60 * 60 * 1000, jitterMs: [0, 0] }, clock, () => 0);
  const fetcher = new RateLimitedFetcher(
    options.source ?? new FakeSource(),
    limiter,
    { delayMs: [0, 0], idleChance: 0, idleMs: [0, 0] },
    clock,
    () => 0.5
  );
  return {
    store: new LowdbStore(memoryDb()),
    fetcher,
    notifier: options.notifier ?? new RecordingNotifier(),
    config: { snapshots: snapshotPolicy, prune: prunePolicy },
    clock
  };
}
