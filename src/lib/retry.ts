/**
 * Bounded exponential backoff
 *
 * Only StoreUnavailableError is retried. Callers wrap idempotent store
 * calls only; anything that could double-apply is called once.
 */

import type { RetryPolicy } from '@/config.js';
import { isStoreUnavailable } from '@/types/index.js';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (0-based), capped at maxDelayMs
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

/**
 * Run an operation, retrying transient store failures
 */
export async function withRetry<T>(
  label: string,
  operation: () => Promise<T>,
  policy: RetryPolicy,
  sleep: Sleep = defaultSleep
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!isStoreUnavailable(error) || attempt >= policy.maxRetries) {
        throw error;
      }

      const delay = backoffDelay(policy, attempt);
      console.warn(
        `[retry] ${label} attempt ${attempt + 1}/${policy.maxRetries + 1} failed: ${error.message}. Retrying in ${delay}ms`
      );
      await sleep(delay);
    }
  }
}
