import type { Project, ReelSnapshot, Trend } from '../models';
import type { JobContext } from '../context';
import type { Store } from '../store';
import { selectProjects } from '../projects';
import { hoursBetween } from '../lib/time';
import { createLogger } from '../logger';
import { errorMessage } from '../errors';
import { latestSnapshots } from './snapshots';

const log = createLogger('analyze');

export const TREND_LABELS: Record<Trend, string> = {
  PEAK: 'PEAK 🔥',
  RISING: 'RISING 🚀',
  DYING: 'DYING 💤',
  STABLE: 'STABLE ⚖️'
};

export type SnapshotPoint = Pick<ReelSnapshot, 'views' | 'likes' | 'comments' | 'capturedAt'>;

export interface Momentum {
  hours: number;
  dv: number;
  dl: number;
  dc: number;
  rateVph: number;
  engagement: number;
  score: number;
  prevScore: number;
  trend: Trend;
}

export interface RankedReel extends Momentum {
  url: string;
}

export function detectTrend(rateVph: number, score: number, prevScore: number): Trend {
  if (rateVph >= 300 && score >= prevScore * 0.9) return 'PEAK';
  if (rateVph >= 80 && score > prevScore) return 'RISING';
  if (rateVph <= 20 && score < prevScore) return 'DYING';
  return 'STABLE';
}

// Pure function of the two most recent snapshots.
export function computeMomentum(cur: SnapshotPoint, prev: SnapshotPoint): Momentum {
  const hours = hoursBetween(prev.capturedAt, cur.capturedAt, 0.01);
  const dv = cur.views - prev.views;
  const dl = cur.likes - prev.likes;
  const dc = cur.comments - prev.comments;

  const rateVph = dv / hours;
  const engagement = (dl / hours) * 1.5 + (dc / hours) * 2.0;
  const score = rateVph * 1.2 + engagement;
  const prevScore = Math.max(prev.views / hours, 1);

  return { hours, dv, dl, dc, rateVph, engagement, score, prevScore, trend: detectTrend(rateVph, score, prevScore) };
}

const round2 = (value: number) => Math.round(value * 100) / 100;

/** Reels with at least two snapshots, best score first. */
export async function rankProject(store: Store, projectId: string): Promise<RankedReel[]> {
  const reels = await store.select('reels', { where: { projectId } });
  const ranked: RankedReel[] = [];

  for (const reel of reels) {
    const snapshots = await latestSnapshots(store, projectId, reel.url, 2);
    if (snapshots.length < 2) continue;
    const [cur, prev] = snapshots;
    ranked.push({ url: reel.url, ...computeMomentum(cur, prev) });
  }

  return ranked.sort((a, b) => b.score - a.score);
}

/**
 * Persists score and trend of every ranked reel and moves the project's
 * single recommendation to the best one. Flags are cleared before the winner
 * is set.
 */
export async function saveRanking(store: Store, projectId: string, ranked: readonly RankedReel[], now: number): Promise<void> {
  const [best] = ranked;
  if (!best) return;

  for (const item of ranked) {
    await store.update('reels', { projectId, url: item.url }, { score: round2(item.score), trend: item.trend, analyzedAt: now });
  }
  await store.update('reels', { projectId }, { isRecommended: false });
  await store.update('reels', { projectId, url: best.url }, { isRecommended: true });
}

export function formatRanking(project: Pick<Project, 'name'>, ranked: readonly RankedReel[]): string {
  if (ranked.length === 0) return `${project.name}: no analyzable reels`;

  const header = ['Rank', 'Reel', 'Age', 'ΔV', 'ΔL', 'ΔC', 'V/hr', 'Score', 'Trend'];
  const rows = ranked.map((r, i) => [
    String(i + 1),
    r.url,
    `${Math.round(r.hours * 60)} min`,
    String(r.dv),
    String(r.dl),
    String(r.dc),
    String(round2(r.rateVph)),
    String(round2(r.score)),
    TREND_LABELS[r.trend]
  ]);
  const widths = header.map((title, col) => Math.max(title.length, ...rows.map((row) => row[col].length)));
  const line = (cells: string[]) => cells.map((cell, col) => cell.padEnd(widths[col])).join('  ').trimEnd();

  return [project.name, line(header), ...rows.map(line)].join('\n');
}

export interface AnalyzeResult {
  projectId: string;
  ranked: RankedReel[];
  recommended: string | null;
}

export interface AnalyzeOutput {
  results: AnalyzeResult[];
  failed: number;
  // only in preview mode
  report?: string;
}

export interface AnalyzeOptions {
  projectId?: string;
  // rank and report without writing
  preview?: boolean;
}

export async function runAnalyze(
  ctx: Pick<JobContext, 'store' | 'clock'>,
  options: AnalyzeOptions = {}
): Promise<AnalyzeOutput> {
  const projects = await selectProjects(ctx.store, options.projectId);
  const output: AnalyzeOutput = { results: [], failed: 0 };
  const sections: string[] = [];

  if (projects.length === 0) log.warn('no_projects', { projectId: options.projectId });

  for (const project of projects) {
    try {
      const ranked = await rankProject(ctx.store, project.id);
      if (options.preview) {
        sections.push(formatRanking(project, ranked));
        output.results.push({ projectId: project.id, ranked, recommended: null });
        continue;
      }

      await saveRanking(ctx.store, project.id, ranked, ctx.clock.now());
      const recommended = ranked[0]?.url ?? null;
      output.results.push({ projectId: project.id, ranked, recommended });
      if (recommended) log.info('recommended', { projectId: project.id, url: recommended, trend: ranked[0].trend });
      else log.info('no_analyzable_reels', { projectId: project.id });
    } catch (err) {
      output.failed += 1;
      log.error('analyze_project_failed', { projectId: project.id, error: errorMessage(err) });
    }
  }

  if (options.preview) output.report = sections.join('\n\n');
  return output;
}
