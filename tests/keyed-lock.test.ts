import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../src/core/keyed-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => { resolve = () => r(); });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs sections for one key in arrival order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('alice', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.run('alice', async () => {
      order.push('second');
    });

    await new Promise(r => setTimeout(r, 0));
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const held = lock.run('alice', () => gate.promise);
    await expect(lock.run('bob', () => 'bob done')).resolves.toBe('bob done');
    gate.resolve();
    await held;
  });

  it('returns the section result', async () => {
    const lock = new KeyedLock();
    await expect(lock.run('k', () => 7)).resolves.toBe(7);
  });

  it('releases the key when a section throws', async () => {
    const lock = new KeyedLock();
    await expect(lock.run('k', () => { throw new Error('bad'); })).rejects.toThrow('bad');
    await expect(lock.run('k', () => 'next')).resolves.toBe('next');
  });

  it('drops idle keys', async () => {
    const lock = new KeyedLock();
    await lock.run('a', () => 1);
    await lock.run('b', () => 2);
    expect(lock.activeKeys).toBe(0);
  });

  it('serializes read-modify-write across many callers', async () => {
    const lock = new KeyedLock();
    let counter = 0;
    await Promise.all(
      Array.from({ length: 50 }, () =>
        lock.run('shared', async () => {
          const seen = counter;
          await Promise.resolve();
          counter = seen + 1;
        }),
      ),
    );
    expect(counter).toBe(50);
  });
});
