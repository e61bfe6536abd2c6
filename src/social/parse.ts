import type { ReelItem } from '../models';

export const MAX_ITEMS_PER_FETCH = 5;

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  return Reflect.get(value, key);
}

function path(value: unknown, ...keys: string[]): unknown {
  return keys.reduce<unknown>((current, key) => field(current, key), value);
}

function count(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

// play count first, then the older view counter, then likes
function pickViews(node: unknown, likes: number): number {
  return count(field(node, 'play_count')) || count(field(node, 'video_view_count')) || likes;
}

function firstCaption(node: unknown): string {
  const edges = path(node, 'edge_media_to_caption', 'edges');
  if (!Array.isArray(edges) || edges.length === 0) return '';
  const text = path(edges[0], 'node', 'text');
  return typeof text === 'string' ? text : '';
}

/**
 * Extracts the most recent video posts from a profile payload. Anything that
 * does not look like a profile yields an empty list.
 */
export function parseReels(payload: unknown): ReelItem[] {
  const edges = path(payload, 'data', 'user', 'edge_owner_to_timeline_media', 'edges');
  if (!Array.isArray(edges)) return [];

  const reels: ReelItem[] = [];
  for (const edge of edges) {
    const node = field(edge, 'node');
    if (field(node, 'is_video') !== true) continue;
    const shortcode = field(node, 'shortcode');
    if (typeof shortcode !== 'string' || !shortcode) continue;

    const likes = count(path(node, 'edge_liked_by', 'count')) ?? 0;
    const comments = count(path(node, 'edge_media_to_comment', 'count')) ?? 0;
    reels.push({
      url: `https://www.instagram.com/reel/${shortcode}/`,
      views: pickViews(node, likes),
      likes,
      comments,
      caption: firstCaption(node)
    });
  }

  return reels.slice(0, MAX_ITEMS_PER_FETCH);
}
