/**
 * Rate-limit backoff for outbound GitHub calls.
 *
 * A call rejected for quota exhaustion is retried after the quota resets,
 * with no attempt limit. Every other error propagates untouched.
 */

import { RateLimitError } from '../core/errors.js';

export interface RateLimitState {
  remaining: number | null;
  resetEpoch: number | null;
}

export interface BackoffLog {
  timestamp: Date;
  attempt: number;
  resetEpoch: number;
  sleepSeconds: number;
}

export interface BackoffConfig {
  bufferSeconds: number;
  sleep: (ms: number) => Promise<void>;
  now: () => number; // epoch ms
  onRetry?: (log: BackoffLog) => void;
}

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  bufferSeconds: 1,
  sleep,
  now: () => Date.now(),
};

interface HeaderSource {
  get(name: string): string | null;
}

function parseHeaderInt(value: string | null): number | null {
  if (value === null || value.trim() === '') return null;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Read the quota headers of a response
 */
export function readRateLimitState(headers: HeaderSource): RateLimitState {
  return {
    remaining: parseHeaderInt(headers.get('x-ratelimit-remaining')),
    resetEpoch: parseHeaderInt(headers.get('x-ratelimit-reset')),
  };
}

/**
 * Seconds to wait before the quota resets, plus a small buffer
 */
export function computeSleepSeconds(resetEpoch: number, nowMs: number, bufferSeconds: number): number {
  return Math.max(0, resetEpoch - Math.floor(nowMs / 1000)) + bufferSeconds;
}

/**
 * Executes a call, sleeping through quota exhaustion and retrying the
 * identical call until it succeeds or fails for another reason
 * @param fn - Async call; rejects with RateLimitError when the quota is spent
 * @param config - Backoff configuration, defaults filled in
 */
export async function withRateLimitBackoff<T>(
  fn: () => Promise<T>,
  config: Partial<BackoffConfig> = {}
): Promise<T> {
  const { bufferSeconds, sleep: wait, now, onRetry } = { ...DEFAULT_BACKOFF_CONFIG, ...config };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof RateLimitError)) {
        throw error;
      }

      const sleepSeconds = computeSleepSeconds(error.resetEpoch, now(), bufferSeconds);
      if (onRetry) {
        onRetry({
          timestamp: new Date(now()),
          attempt,
          resetEpoch: error.resetEpoch,
          sleepSeconds,
        });
      }

      await wait(sleepSeconds * 1000);
    }
  }
}

/**
 * Sleep utility function
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
