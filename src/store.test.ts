import { describe, it, expect, beforeEach } from 'vitest';
import { memoryDb } from './db';
import { LowdbStore } from './store';
import type { Reel } from './models';

function reel(url: string, views: number, extra: Partial<Reel> = {}): Reel {
  return {
    projectId: 'p1',
    url,
    views,
    likes: 0,
    comments: 0,
    lastSeenAt: 0,
    missingCount: 0,
    isRecommended: false,
    score: null,
    trend: null,
    analyzedAt: null,
    ...extra
  };
}

describe('LowdbStore', () => {
  let store: LowdbStore;

  beforeEach(async () => {
    store = new LowdbStore(memoryDb());
    await store.insert('reels', reel('a', 10));
    await store.insert('reels', reel('b', 30));
    await store.insert('reels', reel('c', 20, { projectId: 'p2' }));
  });

  it('filters by equality, orders and limits', async () => {
    const rows = await store.select('reels', { where: { projectId: 'p1' }, orderBy: 'views', descending: true });
    expect(rows.map((r) => r.url)).toEqual(['b', 'a']);

    const top = await store.select('reels', { orderBy: 'views', limit: 2 });
    expect(top.map((r) => r.url)).toEqual(['a', 'c']);
  });

  it('ignores undefined values in where and applies filter predicates', async () => {
    const rows = await store.select('reels', { where: { projectId: undefined }, filter: (r) => r.views >= 20 });
    expect(rows.map((r) => r.url)).toEqual(['b', 'c']);
  });

  it('returns copies that do not write through', async () => {
    const row = await store.first('reels', { where: { url: 'a' } });
    expect(row?.views).toBe(10);
    if (row) row.views = 999;
    expect((await store.first('reels', { where: { url: 'a' } }))?.views).toBe(10);
  });

  it('upserts on the conflict key and only touches the listed fields', async () => {
    await store.update('reels', { url: 'a' }, { isRecommended: true, score: 12.5 });
    await store.upsert('reels', reel('a', 55), { conflict: ['projectId', 'url'], update: ['views'] });

    const row = await store.first('reels', { where: { url: 'a' } });
    expect(row).toMatchObject({ views: 55, isRecommended: true, score: 12.5 });
    expect(await store.select('reels', { where: { url: 'a' } })).toHaveLength(1);
  });

  it('inserts when nothing conflicts', async () => {
    await store.upsert('reels', reel('a', 1, { projectId: 'p3' }), { conflict: ['projectId', 'url'] });
    expect(await store.select('reels', { where: { url: 'a' } })).toHaveLength(2);
  });

  it('updates and removes matching rows and reports counts', async () => {
    expect(await store.update('reels', { projectId: 'p1' }, { missingCount: 2 })).toBe(2);
    expect(await store.remove('reels', { projectId: 'p1', url: 'b' })).toBe(1);
    expect(await store.remove('reels', { url: 'zzz' })).toBe(0);

    const rows = await store.select('reels', { orderBy: 'url' });
    expect(rows.map((r) => [r.url, r.missingCount])).toEqual([
      ['a', 2],
      ['c', 0]
    ]);
  });
});
