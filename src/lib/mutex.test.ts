import { describe, expect, it } from 'vitest';
import { Mutex } from './mutex';

describe('Mutex', () => {
  it('runs callers one at a time in arrival order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const task = (name: string) =>
      mutex.withLock(async () => {
        events.push(`${name}:start`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task('a'), task('b')]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('releases the lock after a rejection', async () => {
    const mutex = new Mutex();

    const failed = mutex.withLock(async () => {
      throw new Error('boom');
    });
    const next = mutex.withLock(async () => 'next');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('next');
  });
});
