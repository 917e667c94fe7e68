/**
 * Tests for the rate-limit backoff
 */

import {
  BackoffLog,
  computeSleepSeconds,
  readRateLimitState,
  withRateLimitBackoff,
} from '../src/utils/retry.js';
import { AuthError, RateLimitError } from '../src/core/errors.js';

const NOW_MS = 1_700_000_000_000;
const NOW_S = NOW_MS / 1000;

describe('Rate limit backoff', () => {
  describe('computeSleepSeconds', () => {
    test('waits until the reset plus the buffer', () => {
      expect(computeSleepSeconds(NOW_S + 2, NOW_MS, 1)).toBe(3);
    });

    test('never waits a negative time for a reset in the past', () => {
      expect(computeSleepSeconds(NOW_S - 30, NOW_MS, 1)).toBe(1);
    });
  });

  describe('readRateLimitState', () => {
    test('reads remaining and reset headers', () => {
      const headers = new Map([
        ['x-ratelimit-remaining', '0'],
        ['x-ratelimit-reset', '1700000060'],
      ]);
      expect(readRateLimitState({ get: (name) => headers.get(name) ?? null })).toEqual({
        remaining: 0,
        resetEpoch: 1700000060,
      });
    });

    test('missing headers are null', () => {
      expect(readRateLimitState({ get: () => null })).toEqual({ remaining: null, resetEpoch: null });
    });
  });

  describe('withRateLimitBackoff', () => {
    test('succeeds on first attempt without sleeping', async () => {
      const fn = jest.fn().mockResolvedValue('success');
      const sleep = jest.fn(async () => undefined);

      await expect(withRateLimitBackoff(fn, { sleep, now: () => NOW_MS })).resolves.toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    test('sleeps through a reset 2s ahead and retries once', async () => {
      const fn = jest
        .fn<Promise<string>, []>()
        .mockRejectedValueOnce(new RateLimitError(NOW_S + 2))
        .mockResolvedValueOnce('page');
      const sleep = jest.fn(async (_ms: number) => undefined);
      const retries: BackoffLog[] = [];

      const result = await withRateLimitBackoff(fn, {
        sleep,
        now: () => NOW_MS,
        onRetry: (entry) => retries.push(entry),
      });

      expect(result).toBe('page');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep.mock.calls[0][0]).toBeGreaterThanOrEqual(2000);
      expect(sleep.mock.calls[0][0]).toBe(3000);
      expect(retries).toHaveLength(1);
      expect(retries[0]).toMatchObject({ attempt: 1, resetEpoch: NOW_S + 2, sleepSeconds: 3 });
    });

    test('keeps retrying for as long as the quota stays exhausted', async () => {
      const fn = jest.fn<Promise<number>, []>();
      for (let i = 0; i < 7; i++) {
        fn.mockRejectedValueOnce(new RateLimitError(NOW_S));
      }
      fn.mockResolvedValueOnce(42);
      const sleep = jest.fn(async (_ms: number) => undefined);

      await expect(withRateLimitBackoff(fn, { sleep, now: () => NOW_MS, bufferSeconds: 0 })).resolves.toBe(42);
      expect(fn).toHaveBeenCalledTimes(8);
      expect(sleep).toHaveBeenCalledTimes(7);
      expect(sleep.mock.calls.every(([ms]) => ms === 0)).toBe(true);
    });

    test('does not retry an AuthError', async () => {
      const fn = jest.fn().mockRejectedValue(new AuthError('bad credential', 401));
      const sleep = jest.fn(async () => undefined);

      await expect(withRateLimitBackoff(fn, { sleep })).rejects.toBeInstanceOf(AuthError);
      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });
  });
});
