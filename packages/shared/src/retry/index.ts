import { Logger } from '../observability';
import { RetriesExhausted, isRetryable, toError } from '../errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: number; // 0-1, fraction of the delay randomised
}

export const defaultRetryPolicy: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: 0.2,
};

export interface RetryOptions {
  operation: string;
  logger?: Logger;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Delay before the attempt following `attempt` (1-based), with the jitter
 * spread evenly around the exponential value.
 */
export function computeBackoff(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  const spread = capped * policy.jitter;
  return Math.max(0, Math.round(capped - spread + random() * spread * 2));
}

/**
 * Runs `fn` until it succeeds, a non-retryable error is thrown, or the
 * attempt budget is spent. Non-retryable errors propagate untouched;
 * running out of attempts raises RetriesExhausted with the last cause.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry || isRetryable;
  const wait = options.sleep || sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!shouldRetry(err)) {
        throw err;
      }

      const error = toError(err);
      if (attempt >= maxAttempts) {
        options.logger?.warn(`${options.operation}: giving up`, { attempts: attempt, error: error.message });
        throw new RetriesExhausted(options.operation, attempt, error);
      }

      const delay = computeBackoff(attempt, policy, options.random);
      options.logger?.debug(`${options.operation}: attempt ${attempt} failed, retrying in ${delay}ms`, {
        error: error.message,
      });
      await wait(delay);
    }
  }
}
