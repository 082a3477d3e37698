import { KeyedMutex } from '../../../src/common/concurrency/keyed-mutex';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs tasks with the same key one at a time, in call order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('role:Editors', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('role:Editors', async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('runs tasks with different keys concurrently', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const started: string[] = [];

    const a = mutex.runExclusive('role:A', async () => {
      started.push('a');
      await gate.promise;
    });
    const b = mutex.runExclusive('role:B', async () => {
      started.push('b');
    });

    await b;
    expect(started).toEqual(['a', 'b']);
    gate.resolve();
    await a;
  });

  it('releases the key when a task rejects', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('principal:p1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('principal:p1', async () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('principal:p1')).toBe(false);
  });

  it('reports a key as locked while a task holds it', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const task = mutex.runExclusive('role:X', () => gate.promise);
    expect(mutex.isLocked('role:X')).toBe(true);

    gate.resolve();
    await task;
    expect(mutex.isLocked('role:X')).toBe(false);
  });
});
