import type { ContentSource, SourceResponse } from './instagram';
import type { Notifier } from './telegram';
import { createLogger } from '../logger';

const log = createLogger('mock');

// Offline stand-in: every handle owns three reels whose counters grow per call.
export class MockSource implements ContentSource {
  private calls = new Map<string, number>();

  constructor(private readonly random: () => number = Math.random) {}

  async request(handle: string): Promise<SourceResponse> {
    const round = (this.calls.get(handle) ?? 0) + 1;
    this.calls.set(handle, round);

    const edges = [1, 2, 3].map((n) => {
      const base = n * 1000 * round;
      return {
        node: {
          is_video: true,
          shortcode: `${handle}-${n}`,
          play_count: base + Math.floor(this.random() * 500),
          edge_liked_by: { count: Math.floor(base / 20) },
          edge_media_to_comment: { count: Math.floor(base / 200) },
          edge_media_to_caption: { edges: [{ node: { text: `mock reel ${n} from @${handle}` } }] }
        }
      };
    });

    return {
      status: 200,
      body: JSON.stringify({ data: { user: { edge_owner_to_timeline_media: { edges } } } })
    };
  }
}

// Prints instead of sending, for local runs without a bot token.
export class ConsoleNotifier implements Notifier {
  async send(destination: string, message: string): Promise<void> {
    log.info('mock_send', { destination, message });
  }
}
