import { describe, it, expect } from 'vitest';
import { Mutex } from './mutex.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Mutex', () => {
  it('starts unlocked', () => {
    expect(new Mutex().isLocked).toBe(false);
  });

  it('returns the critical section result', async () => {
    await expect(new Mutex().runExclusive(() => 42)).resolves.toBe(42);
  });

  it('serialises overlapping async critical sections', async () => {
    const mutex = new Mutex();
    const trace: string[] = [];

    const section = (name: string) =>
      mutex.runExclusive(async () => {
        trace.push(`${name}:start`);
        await delay(5);
        trace.push(`${name}:end`);
      });

    await Promise.all([section('a'), section('b'), section('c')]);

    expect(trace).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('releases the lock when the critical section throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(mutex.isLocked).toBe(false);
    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
  });

  it('stays locked while waiters are queued', async () => {
    const mutex = new Mutex();
    await mutex.acquire();
    const waiting = mutex.acquire();

    mutex.release();
    await waiting;
    expect(mutex.isLocked).toBe(true);

    mutex.release();
    expect(mutex.isLocked).toBe(false);
  });
});
