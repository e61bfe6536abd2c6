import { nanoid } from 'nanoid';
import type { ReelItem, ReelSnapshot } from '../models';
import type { SnapshotPolicy } from '../config';
import type { Store } from '../store';
import { HOUR_MS } from '../lib/time';

export type Observation = Pick<ReelItem, 'views' | 'likes' | 'comments'>;

/**
 * Admission policy for a new observation, first match wins:
 * baseline, meaningful movement, heartbeat after `maxIntervalHours`.
 */
export function shouldRecord(
  last: Pick<ReelSnapshot, 'views' | 'likes' | 'comments' | 'capturedAt'> | undefined,
  observation: Observation,
  now: number,
  policy: Pick<SnapshotPolicy, 'minViewDelta' | 'maxIntervalHours'>
): boolean {
  if (!last) return true;

  const dv = observation.views - last.views;
  if (dv >= policy.minViewDelta || observation.likes > last.likes || observation.comments > last.comments) {
    return true;
  }

  return now - last.capturedAt >= policy.maxIntervalHours * HOUR_MS;
}

// newest first
export function latestSnapshots(store: Store, projectId: string, url: string, limit?: number): Promise<ReelSnapshot[]> {
  return store.select('reelSnapshots', {
    where: { projectId, url },
    orderBy: 'capturedAt',
    descending: true,
    limit
  });
}

export function recordSnapshot(store: Store, projectId: string, item: ReelItem, capturedAt: number): Promise<ReelSnapshot> {
  return store.insert('reelSnapshots', {
    id: nanoid(),
    projectId,
    url: item.url,
    views: item.views,
    likes: item.likes,
    comments: item.comments,
    caption: item.caption,
    capturedAt
  });
}

/** Keeps the `retention` newest snapshots of a reel; returns how many were deleted. */
export async function trimSnapshots(store: Store, projectId: string, url: string, retention: number): Promise<number> {
  const stale = (await latestSnapshots(store, projectId, url)).slice(retention);
  for (const snapshot of stale) {
    await store.remove('reelSnapshots', { id: snapshot.id });
  }
  return stale.length;
}
