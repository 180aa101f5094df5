/**
 * Exponential backoff for transient catalog failures
 *
 * delay(n) = min(base * factor^n, maxDelay) + jitter, except that a server-provided
 * Retry-After replaces the computed delay (bounded by MAX_RETRY_AFTER_MS).
 */

import { isTransientError, retryAfterOf } from '../errors.js';

const MAX_RETRY_AFTER_MS = 300000; // 5 minutes

export interface RetryPolicy {
  /** Total attempts, including the first one */
  attempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions extends Partial<RetryPolicy> {
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 1000,
  factor: 2,
  maxDelayMs: 30000,
  jitterMs: 250
};

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export function resolveRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    attempts: Math.max(1, Math.trunc(overrides.attempts ?? DEFAULT_RETRY_POLICY.attempts)),
    baseDelayMs: overrides.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    factor: overrides.factor ?? DEFAULT_RETRY_POLICY.factor,
    maxDelayMs: overrides.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    jitterMs: overrides.jitterMs ?? DEFAULT_RETRY_POLICY.jitterMs
  };
}

/**
 * Delay before the retry that follows failed attempt number `attempt` (0-based)
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  retryAfterMs?: number,
  random: () => number = Math.random
): number {
  if (retryAfterMs !== undefined) {
    return Math.min(retryAfterMs, MAX_RETRY_AFTER_MS);
  }
  const exponential = Math.min(policy.baseDelayMs * Math.pow(policy.factor, attempt), policy.maxDelayMs);
  return Math.round(exponential + random() * policy.jitterMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const policy = resolveRetryPolicy(options);
  const isRetryable = options.isRetryable ?? isTransientError;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const lastAttempt = attempt >= policy.attempts - 1;
      if (lastAttempt || !isRetryable(error)) {
        throw error;
      }

      const delayMs = computeBackoffDelay(attempt, policy, retryAfterOf(error), options.random);
      options.onRetry?.({ attempt: attempt + 1, delayMs, error });
      await sleep(delayMs);
    }
  }
}
