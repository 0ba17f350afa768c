import { describe, it, expect } from 'vitest';
import { KeyedLock, LockTimeoutError } from '../src/utils/keyed-lock';

describe('KeyedLock', () => {
  it('serializes holders of the same key in arrival order', async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    const hold = async (name: string) => {
      const release = await lock.acquire(['product:a'], 1000);
      order.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      order.push(`${name}:end`);
      release();
    };

    await Promise.all([hold('first'), hold('second'), hold('third')]);

    expect(order).toEqual([
      'first:start',
      'first:end',
      'second:start',
      'second:end',
      'third:start',
      'third:end',
    ]);
  });

  it('does not block unrelated keys', async () => {
    const lock = new KeyedLock();
    const releaseA = await lock.acquire(['product:a'], 1000);

    const releaseB = await lock.acquire(['product:b'], 50);

    expect(lock.isLocked('product:a')).toBe(true);
    expect(lock.isLocked('product:b')).toBe(true);
    releaseA();
    releaseB();
    expect(lock.isLocked('product:a')).toBe(false);
    expect(lock.isLocked('product:b')).toBe(false);
  });

  it('takes overlapping key sets in ascending order so they cannot deadlock', async () => {
    const lock = new KeyedLock();

    const run = async (keys: string[]) => {
      const release = await lock.acquire(keys, 500);
      await new Promise((resolve) => setTimeout(resolve, 5));
      release();
      return 'done';
    };

    await expect(
      Promise.all([run(['product:b', 'product:a']), run(['product:a', 'product:b'])])
    ).resolves.toEqual(['done', 'done']);
  });

  it('times out, releases what it already holds and lets the queue move on', async () => {
    const lock = new KeyedLock();
    const releaseB = await lock.acquire(['product:b'], 1000);

    await expect(lock.acquire(['product:a', 'product:b'], 20)).rejects.toBeInstanceOf(LockTimeoutError);
    expect(lock.isLocked('product:a')).toBe(false);

    releaseB();
    const release = await lock.acquire(['product:b'], 50);
    release();
    expect(lock.isLocked('product:b')).toBe(false);
  });

  it('names the key and timeout in the error', async () => {
    const lock = new KeyedLock();
    const release = await lock.acquire(['invoice:1'], 1000);

    const error = await lock.acquire(['invoice:1'], 10).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LockTimeoutError);
    if (error instanceof LockTimeoutError) {
      expect(error.key).toBe('invoice:1');
      expect(error.message).toBe('Timed out after 10ms waiting for lock invoice:1');
    }
    release();
  });
});
