/**
 * Unit tests for KeyedLock
 */

import { KeyedLock } from './lock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  test('should run tasks for the same key one after another', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run('app', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = lock.run('app', async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);
    expect(lock.isLocked('app')).toBe(true);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(lock.isLocked('app')).toBe(false);
  });

  test('should not block other keys', async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const blocked = lock.run('app', async () => {
      await gate.promise;
      events.push('app');
    });
    await lock.run('other', async () => {
      events.push('other');
    });

    expect(events).toEqual(['other']);
    gate.resolve();
    await blocked;
    expect(events).toEqual(['other', 'app']);
  });

  test('should keep the queue going after a failure', async () => {
    const lock = new KeyedLock();

    const failing = lock.run('app', async () => {
      throw new Error('boom');
    });
    const next = lock.run('app', async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
    expect(lock.isLocked('app')).toBe(false);
  });
});
