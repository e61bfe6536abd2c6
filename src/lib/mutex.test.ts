import { describe, it, expect } from 'vitest';
import { Mutex } from './mutex';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('Mutex', () => {
  it('runs tasks one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([mutex.runExclusive(task('a')), mutex.runExclusive(task('b'))]);
    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.locked).toBe(false);
  });

  it('releases the lock when a task throws', async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await mutex.runExclusive(async () => 'next')).toBe('next');
  });
});
