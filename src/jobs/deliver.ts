import { nanoid } from 'nanoid';
import type { Project, Reel } from '../models';
import type { JobContext } from '../context';
import { selectProjects } from '../projects';
import { localHour, startOfUtcDay } from '../lib/time';
import { createLogger } from '../logger';
import { errorMessage } from '../errors';
import { latestSnapshots } from './snapshots';
import { TREND_LABELS } from './analyze';

const log = createLogger('deliver');

export type SkipReason = 'no_settings' | 'no_destination' | 'before_send_hour' | 'already_sent' | 'no_recommendation';

export type DeliveryCheck =
  | { ready: true; reel: Reel; destination: string }
  | { ready: false; reason: SkipReason };

type DeliverContext = Pick<JobContext, 'store' | 'notifier' | 'clock'>;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function composeMessage(reel: Pick<Reel, 'url' | 'views' | 'likes' | 'comments' | 'trend'>, caption: string): string {
  const trend = reel.trend ? TREND_LABELS[reel.trend] : '-';
  const captionBlock = caption ? `\n\n📝 <b>Caption</b>\n${escapeHtml(caption)}` : '';
  return (
    '<b>🔥 Trending Reel</b>\n\n' +
    `${escapeHtml(reel.url)}\n` +
    `👁 ${reel.views} | ❤️ ${reel.likes} | 💬 ${reel.comments}\n` +
    `📈 ${trend}` +
    captionBlock
  );
}

/** Evaluates every delivery precondition in order without side effects. */
export async function checkDelivery(ctx: Pick<JobContext, 'store'>, project: Project, now: number): Promise<DeliveryCheck> {
  const { store } = ctx;

  const settings = await store.first('deliverySettings', { where: { projectId: project.id } });
  if (!settings) return { ready: false, reason: 'no_settings' };

  const account = await store.first('notificationAccounts', { where: { ownerId: project.ownerId } });
  if (!account) return { ready: false, reason: 'no_destination' };

  if (localHour(now, settings.timezone) < settings.sendHour) return { ready: false, reason: 'before_send_hour' };

  const dayStart = startOfUtcDay(now);
  const sentToday = await store.first('sentReels', {
    where: { projectId: project.id },
    filter: (row) => row.sentAt >= dayStart
  });
  if (sentToday) return { ready: false, reason: 'already_sent' };

  const reel = await store.first('reels', { where: { projectId: project.id, isRecommended: true } });
  if (!reel) return { ready: false, reason: 'no_recommendation' };

  return { ready: true, reel, destination: account.destination };
}

/**
 * Sends today's recommendation for a project at most once per UTC day.
 * Returns false for every skip; a send failure throws and records nothing.
 */
export async function tryDeliver(ctx: DeliverContext, project: Project): Promise<boolean> {
  const now = ctx.clock.now();
  const check = await checkDelivery(ctx, project, now);
  if (!check.ready) {
    log.info('delivery_skipped', { projectId: project.id, reason: check.reason });
    return false;
  }

  const { reel, destination } = check;
  const [latest] = await latestSnapshots(ctx.store, project.id, reel.url, 1);
  const caption = latest?.caption.trim() ?? '';

  await ctx.notifier.send(destination, composeMessage(reel, caption));
  await ctx.store.insert('sentReels', { id: nanoid(), projectId: project.id, url: reel.url, sentAt: now });

  log.info('delivered', { projectId: project.id, url: reel.url });
  return true;
}

export async function runDeliver(ctx: DeliverContext, projectId?: string): Promise<number> {
  const projects = await selectProjects(ctx.store, projectId);
  let delivered = 0;
  let failed = 0;

  for (const project of projects) {
    try {
      if (await tryDeliver(ctx, project)) delivered += 1;
    } catch (err) {
      failed += 1;
      log.error('delivery_failed', { projectId: project.id, error: errorMessage(err) });
    }
  }

  if (delivered > 0 || failed > 0) log.info('delivery_finished', { projects: projects.length, delivered, failed });
  return delivered;
}
