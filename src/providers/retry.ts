import { ProviderError } from '../control-plane/errors.js';
import type { RetryPolicy } from '../control-plane/types.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn`, retrying `ProviderError` up to `policy.attempts` calls in total with
 * exponential backoff from `policy.baseDelayMs`. Any other error is rethrown at once.
 */
export async function withBackoff<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  wait: Sleep = sleep
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof ProviderError) || attempt >= attempts) throw err;
      await wait(policy.baseDelayMs * 2 ** (attempt - 1));
    }
  }
}
