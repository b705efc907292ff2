import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../src/utils/keyed-mutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs callers on the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.runExclusive('s1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('s1', async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('lets different keys run in parallel', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const a = mutex.runExclusive('a', async () => {
      await gate.promise;
      events.push('a');
    });
    const b = mutex.runExclusive('b', async () => {
      events.push('b');
    });

    await b;
    expect(events).toEqual(['b']);
    gate.resolve();
    await a;
    expect(events).toEqual(['b', 'a']);
  });

  it('releases the lock when the holder throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('s1', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('s1', () => 'after')).resolves.toBe('after');
  });

  it('drops keys with no holder or waiters', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const held = mutex.runExclusive('s1', () => gate.promise);
    expect(mutex.isLocked('s1')).toBe(true);
    expect(mutex.size).toBe(1);

    gate.resolve();
    await held;
    expect(mutex.isLocked('s1')).toBe(false);
    expect(mutex.size).toBe(0);
  });
});
