import type { Reel, ReelSnapshot } from '../models';
import type { PrunePolicy } from '../config';
import type { Store } from '../store';
import { DAY_MS, hoursBetween } from '../lib/time';
import { createLogger } from '../logger';
import { latestSnapshots } from './snapshots';

const log = createLogger('lifecycle');

export type PruneReason = 'hard_stale' | 'inactive' | 'no_growth' | 'low_growth' | 'old_and_weak';

type SnapshotPoint = Pick<ReelSnapshot, 'views' | 'capturedAt'>;

/**
 * First pruning rule that fires for a reel, or null to keep tracking it.
 * `snapshots` are newest first; fewer than two skips the growth rules.
 */
export function pruneReason(
  reel: Pick<Reel, 'views' | 'lastSeenAt'>,
  snapshots: readonly SnapshotPoint[],
  now: number,
  policy: PrunePolicy
): PruneReason | null {
  const unseenMs = now - reel.lastSeenAt;
  if (unseenMs > policy.hardStaleDays * DAY_MS) return 'hard_stale';
  if (unseenMs > policy.maxInactiveDays * DAY_MS) return 'inactive';

  if (snapshots.length >= 2) {
    const [cur, prev] = snapshots;
    const dv = cur.views - prev.views;
    if (dv <= 0) return 'no_growth';
    if (dv / hoursBetween(prev.capturedAt, cur.capturedAt, 0.1) < policy.minViewsPerHour) return 'low_growth';
  }

  if (Math.floor(unseenMs / DAY_MS) >= policy.maxReelAgeDays && reel.views < policy.minTotalViews) {
    return 'old_and_weak';
  }

  return null;
}

// history first, then the current-state row
export async function deleteReel(store: Store, projectId: string, url: string): Promise<void> {
  await store.remove('reelSnapshots', { projectId, url });
  await store.remove('reels', { projectId, url });
}

/**
 * Bumps `missingCount` on every known reel that was not observed in this
 * pass and deletes the ones that reached the threshold.
 */
export async function reconcileMissing(
  store: Store,
  projectId: string,
  observed: ReadonlySet<string>,
  policy: Pick<PrunePolicy, 'missingThreshold'>
): Promise<{ missing: number; removed: number }> {
  const reels = await store.select('reels', { where: { projectId } });
  let missing = 0;
  let removed = 0;

  for (const reel of reels) {
    if (observed.has(reel.url)) continue;
    missing += 1;
    const missingCount = reel.missingCount + 1;
    if (missingCount >= policy.missingThreshold) {
      await deleteReel(store, projectId, reel.url);
      removed += 1;
      log.info('reel_removed_missing', { projectId, url: reel.url, missingCount });
    } else {
      await store.update('reels', { projectId, url: reel.url }, { missingCount });
    }
  }

  return { missing, removed };
}

export async function pruneProject(store: Store, projectId: string, now: number, policy: PrunePolicy): Promise<number> {
  const reels = await store.select('reels', { where: { projectId } });
  let pruned = 0;

  for (const reel of reels) {
    const reason = pruneReason(reel, await latestSnapshots(store, projectId, reel.url, 2), now, policy);
    if (!reason) continue;
    await deleteReel(store, projectId, reel.url);
    pruned += 1;
    log.info('reel_pruned', { projectId, url: reel.url, reason });
  }

  return pruned;
}
