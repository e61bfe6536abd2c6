import { describe, it, expect } from 'vitest';
import { HOUR_MS } from '../lib/time';
import { FakeSource, profileBody, reelUrl, testContext, T0 } from '../test-helpers';
import { createProject } from '../projects';
import type { Store } from '../store';
import { runMonitor } from './monitor';

const ok = (items: Parameters<typeof profileBody>[0]) => ({ status: 200, body: profileBody(items) });

async function seedReel(store: Store, projectId: string, url: string) {
  await store.insert('reels', {
    projectId,
    url,
    views: 500,
    likes: 0,
    comments: 0,
    lastSeenAt: T0,
    missingCount: 0,
    isRecommended: false,
    score: null,
    trend: null,
    analyzedAt: null
  });
}

describe('runMonitor', () => {
  it('upserts observed reels and records snapshots only on movement', async () => {
    const source = new FakeSource().respond(
      'chef',
      ok([
        { code: 'r1', views: 100, caption: 'soup' },
        { code: 'r2', views: 50 }
      ]),
      ok([
        { code: 'r1', views: 200 },
        { code: 'r2', views: 50 }
      ])
    );
    const ctx = testContext({ source });
    const project = await createProject(ctx.store, { name: 'Food', ownerId: 'u1', handles: ['@chef'] }, T0);

    const first = await runMonitor(ctx);
    expect(first).toEqual({
      projects: 1,
      reels: 2,
      snapshots: 2,
      removedMissing: 0,
      pruned: 0,
      failed: 0,
      blocked: false,
      interrupted: false
    });

    await ctx.store.update('reels', { url: reelUrl('r1') }, { isRecommended: true });
    ctx.clock.advance(HOUR_MS);
    const second = await runMonitor(ctx);
    expect(second.snapshots).toBe(1);

    const r1 = await ctx.store.first('reels', { where: { projectId: project.id, url: reelUrl('r1') } });
    expect(r1).toMatchObject({ views: 200, lastSeenAt: T0 + HOUR_MS, missingCount: 0, isRecommended: true });
    expect(await ctx.store.select('reelSnapshots', { where: { url: reelUrl('r1') } })).toHaveLength(2);
    expect(await ctx.store.select('reelSnapshots', { where: { url: reelUrl('r2') } })).toHaveLength(1);
    expect(source.requests).toEqual(['chef', 'chef']);
  });

  it('removes a reel after it goes unseen for the missing threshold', async () => {
    const source = new FakeSource().respond('chef', ok([{ code: 'keep' }, { code: 'gone' }]), ok([{ code: 'keep' }]));
    const ctx = testContext({ source });
    const project = await createProject(ctx.store, { name: 'Food', ownerId: 'u1', handles: ['chef'] }, T0);
    const gone = { projectId: project.id, url: reelUrl('gone') };

    await runMonitor(ctx);
    for (const expected of [1, 2]) {
      ctx.clock.advance(HOUR_MS);
      const summary = await runMonitor(ctx);
      expect(summary.removedMissing).toBe(0);
      expect((await ctx.store.first('reels', { where: gone }))?.missingCount).toBe(expected);
    }

    ctx.clock.advance(HOUR_MS);
    expect((await runMonitor(ctx)).removedMissing).toBe(1);
    expect(await ctx.store.first('reels', { where: gone })).toBeUndefined();
    expect(await ctx.store.select('reelSnapshots', { where: gone })).toEqual([]);
    expect(await ctx.store.first('reels', { where: { url: reelUrl('keep') } })).toBeDefined();
  });

  it('stops fetching for every project once the source blocks, without reconciling', async () => {
    const source = new FakeSource().respond('a1', { status: 429, body: '' }, ok([]));
    const ctx = testContext({ source });
    const a = await createProject(ctx.store, { name: 'A', ownerId: 'u1', handles: ['a1', 'a2'] }, T0);
    const b = await createProject(ctx.store, { name: 'B', ownerId: 'u1', handles: ['b1'] }, T0 + 1);
    await seedReel(ctx.store, a.id, 'a-old');
    await seedReel(ctx.store, b.id, 'b-old');

    const summary = await runMonitor(ctx);
    expect(summary).toMatchObject({ projects: 2, blocked: true, failed: 0, removedMissing: 0 });
    expect(source.requests).toEqual(['a1']);
    expect((await ctx.store.select('reels')).map((r) => r.missingCount)).toEqual([0, 0]);

    // the next pass starts unblocked
    const next = await runMonitor(ctx);
    expect(next.blocked).toBe(false);
    expect(source.requests).toEqual(['a1', 'a1', 'a2', 'b1']);
    expect((await ctx.store.select('reels')).map((r) => r.missingCount)).toEqual([1, 1]);
  });

  it('stops between handles once cancelled, without reconciling', async () => {
    const source = new FakeSource().respond('a1', ok([{ code: 'x1', views: 10 }]));
    const ctx = testContext({ source });
    const a = await createProject(ctx.store, { name: 'A', ownerId: 'u1', handles: ['a1', 'a2'] }, T0);
    await createProject(ctx.store, { name: 'B', ownerId: 'u1', handles: ['b1'] }, T0 + 1);
    await seedReel(ctx.store, a.id, 'a-old');

    const summary = await runMonitor(ctx, undefined, () => source.requests.length >= 1);
    expect(summary).toMatchObject({ projects: 2, reels: 1, snapshots: 1, interrupted: true, blocked: false });
    expect(source.requests).toEqual(['a1']);
    expect((await ctx.store.first('reels', { where: { url: 'a-old' } }))?.missingCount).toBe(0);
  });

  it('skips reconciliation for a project without handles', async () => {
    const ctx = testContext();
    const project = await createProject(ctx.store, { name: 'Empty', ownerId: 'u1' }, T0);
    await seedReel(ctx.store, project.id, 'kept');

    const summary = await runMonitor(ctx);
    expect(summary).toMatchObject({ projects: 1, reels: 0, removedMissing: 0, pruned: 0 });
    expect((await ctx.store.first('reels', { where: { url: 'kept' } }))?.missingCount).toBe(0);
  });

  it('prunes stale reels even when nothing was fetched', async () => {
    const ctx = testContext();
    const project = await createProject(ctx.store, { name: 'Empty', ownerId: 'u1' }, T0);
    await seedReel(ctx.store, project.id, 'stale');
    ctx.clock.advance(4 * 24 * HOUR_MS);

    expect((await runMonitor(ctx, project.id)).pruned).toBe(1);
    expect(await ctx.store.select('reels')).toEqual([]);
  });
});
