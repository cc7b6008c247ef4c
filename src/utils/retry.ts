import { createLogger } from './logger';

const log = createLogger('retry');

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number | undefined;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Delay before attempt `attempt + 1`, doubling from the base delay. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * 2 ** (attempt - 1);
  return policy.maxDelayMs !== undefined ? Math.min(delay, policy.maxDelayMs) : delay;
}

export interface RetryOptions {
  label: string;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: Sleep;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt === attempts) break;

      const delay = backoffDelay(policy, attempt);
      log.warn(`${options.label} failed on attempt ${attempt}/${attempts}; retrying in ${delay}ms`, {
        error: error instanceof Error ? error.message : String(error),
      });
      await wait(delay);
    }
  }

  throw lastError;
}
