import { UserLockRegistry } from './user-lock.registry';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('UserLockRegistry', () => {
  it('runs tasks for the same key one at a time in arrival order', async () => {
    const locks = new UserLockRegistry<number>();
    const gate = deferred();
    const order: string[] = [];

    const first = locks.runExclusive(1, async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = locks.runExclusive(1, async () => {
      order.push('second');
    });

    await flush();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not make different keys wait on each other', async () => {
    const locks = new UserLockRegistry<number>();
    const gate = deferred();

    const blocked = locks.runExclusive(1, () => gate.promise);
    await expect(locks.runExclusive(2, async () => 'free')).resolves.toBe('free');

    gate.resolve();
    await blocked;
  });

  it('releases the lock when the task throws', async () => {
    const locks = new UserLockRegistry<number>();

    await expect(locks.runExclusive(1, async () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
    await expect(locks.runExclusive(1, async () => 'next')).resolves.toBe('next');
  });

  it('rejects with the abort reason and lets later waiters through', async () => {
    const locks = new UserLockRegistry<number>();
    const gate = deferred();
    const controller = new AbortController();
    const reason = new Error('stop');

    const holder = locks.runExclusive(1, () => gate.promise);
    const aborted = locks.runExclusive(1, async () => 'never', controller.signal);
    const later = locks.runExclusive(1, async () => 'later');

    controller.abort(reason);
    await expect(aborted).rejects.toBe(reason);

    gate.resolve();
    await holder;
    await expect(later).resolves.toBe('later');
  });

  it('forgets keys once their queue drains', async () => {
    const locks = new UserLockRegistry<number>();

    await locks.runExclusive(1, async () => undefined);
    await flush();

    expect(locks.size).toBe(0);
  });
});
