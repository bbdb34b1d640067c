import { setTimeout as delay } from 'node:timers/promises';

/**
 * Exponential backoff schedule with jitter.
 */
export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Multiplier per attempt (2 doubles each time) */
  backoffMultiplier: number;
  /** Random extra delay as a fraction of the computed delay (0-1) */
  jitterFactor: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Delay before retry number `attempt` (0-based):
 * `min(base * multiplier^attempt, max)` plus up to `jitterFactor` of that.
 */
export function calculateDelay(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, policy.maxDelayMs);
  const jitter = cappedDelay * policy.jitterFactor * random();
  return Math.floor(cappedDelay + jitter);
}

export interface RetryOptions {
  maxAttempts: number;
  policy: BackoffPolicy;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn` until it resolves or `maxAttempts` calls have failed. Rethrows the
 * last error.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt < options.maxAttempts) {
        const delayMs = calculateDelay(options.policy, attempt - 1);
        options.onRetry?.(error, attempt, delayMs);
        await delay(delayMs);
      }
    }
  }
  throw lastError;
}
