/**
 * Jest Unit Tests for ConcurrencyLimiter and KeyedLock
 */

import { ConcurrencyLimiter, KeyedLock } from '../concurrency-limiter.js';
import { sleep } from '../retry.js';

describe('ConcurrencyLimiter', () => {
  test('never runs more than maxConcurrent tasks at once', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let active = 0;
    let peak = 0;
    const task = async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    };

    await Promise.all(Array.from({ length: 6 }, () => limiter.run(task)));

    expect(peak).toBe(2);
    expect(limiter.getActive()).toBe(0);
    expect(limiter.getQueued()).toBe(0);
  });

  test('queued tasks start in arrival order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map(n =>
        limiter.run(async () => {
          await sleep(1);
          order.push(n);
        })
      )
    );

    expect(order).toEqual([1, 2, 3]);
  });

  test('reports active and queued counts', async () => {
    const limiter = new ConcurrencyLimiter(1);
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });

    const runs = [limiter.run(() => gate), limiter.run(async () => 2), limiter.run(async () => 3)];

    expect(limiter.getActive()).toBe(1);
    expect(limiter.getQueued()).toBe(2);
    release();
    await Promise.all(runs);
    expect(limiter.getActive()).toBe(0);
  });

  test('a rejected task releases its slot', async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(limiter.run(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(limiter.run(async () => 'next')).resolves.toBe('next');
  });

  test('rejects a non-positive limit', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(1.5)).toThrow(RangeError);
  });
});

describe('KeyedLock', () => {
  test('serializes work on the same key', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const work = (name: string) =>
      lock.withLock('doc', async () => {
        events.push(`${name}:start`);
        await sleep(5);
        events.push(`${name}:end`);
      });

    await Promise.all([work('a'), work('b')]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(lock.isLocked('doc')).toBe(false);
  });

  test('different keys do not wait for each other', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.withLock('one', async () => {
        events.push('one:start');
        await sleep(10);
        events.push('one:end');
      }),
      lock.withLock('two', async () => {
        events.push('two:start');
        events.push('two:end');
      }),
    ]);

    expect(events.indexOf('two:end')).toBeLessThan(events.indexOf('one:end'));
  });

  test('a failing holder releases the key', async () => {
    const lock = new KeyedLock();

    await expect(lock.withLock('doc', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(lock.withLock('doc', async () => 'after')).resolves.toBe('after');
  });
});
