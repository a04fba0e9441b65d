import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { backoffDelay, retryWithBackoff } from './retry.js';

function recordingSleep(delays: number[]): (ms: number) => Promise<void> {
  return async (ms: number) => {
    delays.push(ms);
  };
}

describe('backoffDelay', () => {
  it('does not wait before the first attempt', () => {
    assert.equal(backoffDelay(1), 0);
  });

  it('doubles from one second', () => {
    assert.deepEqual([2, 3, 4].map(n => backoffDelay(n)), [1000, 2000, 4000]);
  });

  it('caps at maxDelay', () => {
    const delay = backoffDelay(10, { initialDelay: 1000, maxDelay: 5000, backoffMultiplier: 2 });
    assert.equal(delay, 5000);
  });
});

describe('retryWithBackoff', () => {
  it('stops at the first success', async () => {
    const delays: number[] = [];
    let calls = 0;
    const outcome = await retryWithBackoff(async () => {
      calls++;
      return true;
    }, { maxAttempts: 3, sleep: recordingSleep(delays) });

    assert.deepEqual(outcome, { succeeded: true, attempts: 1 });
    assert.equal(calls, 1);
    assert.deepEqual(delays, []);
  });

  it('spends the whole budget when every attempt fails', async () => {
    const delays: number[] = [];
    const seen: number[] = [];
    const outcome = await retryWithBackoff(async n => {
      seen.push(n);
      return false;
    }, { maxAttempts: 3, sleep: recordingSleep(delays) });

    assert.deepEqual(outcome, { succeeded: false, attempts: 3 });
    assert.deepEqual(seen, [1, 2, 3]);
    assert.deepEqual(delays, [1000, 2000]);
  });

  it('treats a thrown error as a failed attempt', async () => {
    const errors: number[] = [];
    const outcome = await retryWithBackoff(async n => {
      if (n === 1) {
        throw new Error('connection reset');
      }
      return true;
    }, {
      maxAttempts: 2,
      sleep: recordingSleep([]),
      onError: (_error, attempt) => errors.push(attempt),
    });

    assert.deepEqual(outcome, { succeeded: true, attempts: 2 });
    assert.deepEqual(errors, [1]);
  });

  it('reports each retry before waiting', async () => {
    const retries: Array<[number, number]> = [];
    await retryWithBackoff(async () => false, {
      maxAttempts: 2,
      sleep: recordingSleep([]),
      onRetry: (next, delay) => retries.push([next, delay]),
    });

    assert.deepEqual(retries, [[2, 1000]]);
  });
});
