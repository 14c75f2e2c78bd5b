import { describe, it, expect } from 'vitest';
import { createLock } from '../../src/utils/lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createLock()', () => {
  it('runs operations one at a time in call order', async () => {
    const lock = createLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock(async () => {
      events.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps going after a rejection', async () => {
    const lock = createLock();
    const failing = lock(async () => {
      throw new Error('boom');
    });
    const next = lock(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('ok');
  });
});
