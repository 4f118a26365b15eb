/**
 * Unit tests for Retry Runner
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  backoffDelay,
  resolveRetryConfig,
  retryAsync,
  RETRY_DEFAULTS,
  type RetryInfo,
} from '../../../src/core/retry.js';

const NO_DELAY = { minDelayMs: 0, maxDelayMs: 0, jitter: 0 };

describe('resolveRetryConfig', () => {
  it('should fall back to defaults', () => {
    assert.deepStrictEqual(resolveRetryConfig(RETRY_DEFAULTS), RETRY_DEFAULTS);
  });

  it('should clamp out-of-range values', () => {
    assert.deepStrictEqual(
      resolveRetryConfig(RETRY_DEFAULTS, { attempts: 0, minDelayMs: 100, maxDelayMs: 10, jitter: 5 }),
      { attempts: 1, minDelayMs: 100, maxDelayMs: 100, jitter: 1 }
    );
  });
});

describe('backoffDelay', () => {
  const config = { attempts: 5, minDelayMs: 100, maxDelayMs: 1000, jitter: 0 };

  it('should double the delay per attempt', () => {
    assert.deepStrictEqual([1, 2, 3].map((attempt) => backoffDelay(attempt, config)), [100, 200, 400]);
  });

  it('should cap the delay', () => {
    assert.strictEqual(backoffDelay(10, config), 1000);
  });

  it('should keep jittered delays within bounds', () => {
    const jittered = { ...config, jitter: 1 };
    for (let i = 0; i < 20; i++) {
      const delay = backoffDelay(2, jittered);
      assert.ok(delay >= 100 && delay <= 1000, `delay ${delay} out of bounds`);
    }
  });
});

describe('retryAsync', () => {
  it('should return the first successful result', async () => {
    const seen: number[] = [];

    const result = await retryAsync(async (attempt) => {
      seen.push(attempt);
      if (attempt < 3) throw new Error(`failure ${attempt}`);
      return 'ok';
    }, { ...NO_DELAY, attempts: 3 });

    assert.strictEqual(result, 'ok');
    assert.deepStrictEqual(seen, [1, 2, 3]);
  });

  it('should throw the last error when attempts run out', async () => {
    let calls = 0;

    await assert.rejects(
      retryAsync(async (attempt) => {
        calls++;
        throw new Error(`failure ${attempt}`);
      }, { ...NO_DELAY, attempts: 2 }),
      { message: 'failure 2' }
    );
    assert.strictEqual(calls, 2);
  });

  it('should stop when shouldRetry declines', async () => {
    let calls = 0;

    await assert.rejects(
      retryAsync(async () => {
        calls++;
        throw new Error('permanent');
      }, { ...NO_DELAY, attempts: 5, shouldRetry: () => false }),
      { message: 'permanent' }
    );
    assert.strictEqual(calls, 1);
  });

  it('should report each retry', async () => {
    const retries: RetryInfo[] = [];

    await retryAsync(async (attempt) => {
      if (attempt === 1) throw new Error('throttled');
      return attempt;
    }, { ...NO_DELAY, attempts: 3, label: 'azurerm_resource_group.main', onRetry: (info) => retries.push(info) });

    assert.strictEqual(retries.length, 1);
    assert.strictEqual(retries[0]?.attempt, 1);
    assert.strictEqual(retries[0]?.maxAttempts, 3);
    assert.strictEqual(retries[0]?.delayMs, 0);
    assert.strictEqual(retries[0]?.label, 'azurerm_resource_group.main');
  });
});
