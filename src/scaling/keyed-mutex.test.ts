import { KeyedMutex } from './keyed-mutex';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs sections under the same key one at a time in submission order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('reg-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('reg-1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block sections under different keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const slow = mutex.runExclusive('reg-1', async () => {
      await gate.promise;
      order.push('reg-1');
    });
    await mutex.runExclusive('reg-2', () => {
      order.push('reg-2');
    });

    gate.resolve();
    await slow;
    expect(order).toEqual(['reg-2', 'reg-1']);
  });

  it('keeps the key usable after a section throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('reg-1', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('reg-1', () => 42)).resolves.toBe(42);
  });
});
