import { describe, expect, it } from 'vitest';
import { ReadWriteLock } from './rw-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ReadWriteLock', () => {
  it('lets readers share the lock', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.withRead(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.withRead(() => {
      events.push('second');
    });

    await second;
    gate.resolve();
    await first;

    expect(events).toEqual(['first:start', 'second', 'first:end']);
  });

  it('gives writers exclusive access in arrival order', async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const events: string[] = [];

    const reader = lock.withRead(async () => {
      events.push('read1:start');
      await gate.promise;
      events.push('read1:end');
    });
    const writer = lock.withWrite(() => {
      events.push('write');
    });
    // Queued behind the writer, not let in alongside read1
    const lateReader = lock.withRead(() => {
      events.push('read2');
    });

    gate.resolve();
    await Promise.all([reader, writer, lateReader]);

    expect(events).toEqual(['read1:start', 'read1:end', 'write', 'read2']);
  });

  it('releases the lock when the callback throws', async () => {
    const lock = new ReadWriteLock();

    await expect(lock.withWrite(() => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.withWrite(() => 'ok')).resolves.toBe('ok');
  });
});
