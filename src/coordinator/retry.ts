/**
 * Bounded retry with exponential backoff for lock contention
 */

import { StorageError, StorageErrorCode } from '../storage/types.js';

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Add up to 50% random jitter to each delay */
  jitter: boolean;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, delayMs: number, error: StorageError) => void;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `attempt` (0-based)
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = config.baseDelayMs * Math.pow(2, attempt);
  delay = Math.min(delay, config.maxDelayMs);
  if (config.jitter) {
    delay = delay + Math.random() * delay * 0.5;
  }
  return Math.round(delay);
}

export function isLockContention(error: unknown): error is StorageError {
  return error instanceof StorageError && error.code === StorageErrorCode.LOCKED;
}

/**
 * Run `fn`, retrying while it fails with a LOCKED StorageError. Other errors
 * and the last LOCKED error propagate unchanged.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isLockContention(error) || attempt >= config.maxRetries) {
        throw error;
      }
      const delay = calculateDelay(attempt, config);
      hooks.onRetry?.(attempt + 1, delay, error);
      await wait(delay);
    }
  }
}
