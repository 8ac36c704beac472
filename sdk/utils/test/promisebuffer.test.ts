import { describe, expect, it, vi } from 'vitest';

import { LanternError } from '../src/error';
import { makePromiseBuffer } from '../src/promisebuffer';

function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('makePromiseBuffer', () => {
  it('tracks tasks until they settle', async () => {
    const buffer = makePromiseBuffer<string>();
    const task = deferred<string>();

    const added = buffer.add(() => task.promise);
    expect(buffer.$).toHaveLength(1);

    task.resolve('done');
    await expect(added).resolves.toBe('done');
    await Promise.resolve();
    expect(buffer.$).toHaveLength(0);
  });

  it('rejects without running the producer once the limit is reached', async () => {
    const buffer = makePromiseBuffer<void>(1);
    buffer.add(() => deferred<void>().promise);

    const producer = vi.fn(() => Promise.resolve());
    await expect(buffer.add(producer)).rejects.toBeInstanceOf(LanternError);
    expect(producer).not.toHaveBeenCalled();
    expect(buffer.$).toHaveLength(1);
  });

  it('drains immediately when empty', async () => {
    const buffer = makePromiseBuffer<void>();
    await expect(buffer.drain(10)).resolves.toBe(true);
  });

  it('counts failed tasks as drained', async () => {
    const buffer = makePromiseBuffer<void>();
    const ok = deferred<void>();
    const failing = deferred<void>();

    const rejected = buffer.add(() => failing.promise);
    buffer.add(() => ok.promise);
    const drained = buffer.drain();

    failing.reject(new Error('send failed'));
    ok.resolve();

    await expect(rejected).rejects.toThrow('send failed');
    await expect(drained).resolves.toBe(true);
  });

  it('gives up after the timeout', async () => {
    vi.useFakeTimers();
    try {
      const buffer = makePromiseBuffer<void>();
      buffer.add(() => deferred<void>().promise);

      const drained = buffer.drain(100);
      vi.advanceTimersByTime(100);

      await expect(drained).resolves.toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });
});
