/**
 * Jest Unit Tests for Retry and Timeout Helpers
 */

import { EmbeddingUnavailable, InvalidInput } from '../../errors.js';
import { calculateBackoffWithJitter, withRetry, withTimeout } from '../retry.js';

const FAST = { attempts: 3, baseDelayMs: 1, maxDelayMs: 2 };

describe('withRetry', () => {
  test('retries transient errors until the call succeeds', async () => {
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new EmbeddingUnavailable('blip');
        return 'ok';
      },
      FAST,
      { operation: 'test' }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  test('gives up after the configured attempts with the last error', async () => {
    let calls = 0;

    await expect(
      withRetry(
        async attempt => {
          calls++;
          throw new EmbeddingUnavailable(`failure ${attempt}`);
        },
        FAST,
        { operation: 'test' }
      )
    ).rejects.toThrow('failure 2');
    expect(calls).toBe(3);
  });

  test('non-transient errors are not retried', async () => {
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new InvalidInput('bad', ['bad']);
        },
        FAST,
        { operation: 'test' }
      )
    ).rejects.toBeInstanceOf(InvalidInput);
    expect(calls).toBe(1);
  });

  test('a custom predicate decides what is retried', async () => {
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error('plain');
        },
        FAST,
        { operation: 'test', shouldRetry: () => true }
      )
    ).rejects.toThrow('plain');
    expect(calls).toBe(3);
  });
});

describe('withTimeout', () => {
  test('passes through a result that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, () => new Error('late'))).resolves.toBe(42);
  });

  test('rejects with the timeout error when the promise never settles', async () => {
    const never = new Promise<number>(() => undefined);

    await expect(withTimeout(never, 10, () => new EmbeddingUnavailable('too slow'))).rejects.toThrow('too slow');
  });
});

describe('calculateBackoffWithJitter', () => {
  test('grows exponentially with up to 20% jitter', () => {
    const first = calculateBackoffWithJitter(0, 500, 8000);
    const third = calculateBackoffWithJitter(2, 500, 8000);

    expect(first).toBeGreaterThanOrEqual(500);
    expect(first).toBeLessThanOrEqual(600);
    expect(third).toBeGreaterThanOrEqual(2000);
    expect(third).toBeLessThanOrEqual(2400);
  });

  test('is capped at maxMs before jitter', () => {
    const delay = calculateBackoffWithJitter(10, 500, 8000);

    expect(delay).toBeGreaterThanOrEqual(8000);
    expect(delay).toBeLessThanOrEqual(9600);
  });
});
