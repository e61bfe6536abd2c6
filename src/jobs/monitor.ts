import type { Project, ReelItem } from '../models';
import type { JobContext } from '../context';
import { listHandles, selectProjects } from '../projects';
import { isBlocked } from '../social/fetcher';
import { createLogger } from '../logger';
import { errorMessage } from '../errors';
import { latestSnapshots, recordSnapshot, shouldRecord, trimSnapshots } from './snapshots';
import { pruneProject, reconcileMissing } from './lifecycle';

const log = createLogger('monitor');

export interface MonitorSummary {
  projects: number;
  reels: number;
  snapshots: number;
  removedMissing: number;
  pruned: number;
  failed: number;
  blocked: boolean;
  // stopped early by a shutdown request
  interrupted: boolean;
}

// checked between handles; true ends the pass
export type Cancelled = () => boolean;

type MonitorContext = Pick<JobContext, 'store' | 'fetcher' | 'config' | 'clock'>;

/**
 * Current-state upsert, snapshot decision and trim for one observed reel.
 * The three steps always run together and in this order.
 */
export async function observeReel(ctx: MonitorContext, projectId: string, item: ReelItem): Promise<boolean> {
  const { store, config } = ctx;
  const now = ctx.clock.now();

  await store.upsert(
    'reels',
    {
      projectId,
      url: item.url,
      views: item.views,
      likes: item.likes,
      comments: item.comments,
      lastSeenAt: now,
      missingCount: 0,
      isRecommended: false,
      score: null,
      trend: null,
      analyzedAt: null
    },
    { conflict: ['projectId', 'url'], update: ['views', 'likes', 'comments', 'lastSeenAt', 'missingCount'] }
  );

  const [last] = await latestSnapshots(store, projectId, item.url, 1);
  const recorded = shouldRecord(last, item, now, config.snapshots);
  if (recorded) await recordSnapshot(store, projectId, item, now);
  await trimSnapshots(store, projectId, item.url, config.snapshots.retention);
  return recorded;
}

async function monitorProject(
  ctx: MonitorContext,
  project: Project,
  summary: MonitorSummary,
  cancelled: Cancelled
): Promise<void> {
  const handles = await listHandles(ctx.store, project.id);
  const observed = new Set<string>();
  let complete = handles.length > 0;

  for (const handle of handles) {
    if (ctx.fetcher.isBlocked) {
      complete = false;
      break;
    }
    if (cancelled()) {
      complete = false;
      summary.interrupted = true;
      log.warn('monitor_interrupted', { project: project.name, handle });
      break;
    }

    log.info('fetching', { project: project.name, handle });
    const result = await ctx.fetcher.fetch(handle);
    if (isBlocked(result)) {
      complete = false;
      summary.blocked = true;
      log.warn('fetching_stopped_blocked', { project: project.name, handle });
      break;
    }

    for (const item of result) {
      observed.add(item.url);
      summary.reels += 1;
      if (await observeReel(ctx, project.id, item)) summary.snapshots += 1;
    }
  }

  // a blocked or interrupted pass says nothing about which reels disappeared
  if (complete) {
    const { removed } = await reconcileMissing(ctx.store, project.id, observed, ctx.config.prune);
    summary.removedMissing += removed;
  }

  summary.pruned += await pruneProject(ctx.store, project.id, ctx.clock.now(), ctx.config.prune);
}

export async function runMonitor(
  ctx: MonitorContext,
  projectId?: string,
  cancelled: Cancelled = () => false
): Promise<MonitorSummary> {
  ctx.fetcher.reset();
  const projects = await selectProjects(ctx.store, projectId);
  const summary: MonitorSummary = {
    projects: projects.length,
    reels: 0,
    snapshots: 0,
    removedMissing: 0,
    pruned: 0,
    failed: 0,
    blocked: false,
    interrupted: false
  };

  log.info('monitor_started', { projects: projects.length, projectId });

  for (const project of projects) {
    if (summary.interrupted || cancelled()) {
      summary.interrupted = true;
      break;
    }
    try {
      await monitorProject(ctx, project, summary, cancelled);
    } catch (err) {
      summary.failed += 1;
      log.error('monitor_project_failed', { projectId: project.id, error: errorMessage(err) });
    }
  }

  summary.blocked = summary.blocked || ctx.fetcher.isBlocked;
  log.info('monitor_finished', { ...summary });
  return summary;
}
