import { ExponentialBackoff, handleWhen, retry, type RetryPolicy } from 'cockatiel';
import { isTransientFailure } from '../core/errors.js';

export interface StageRetryOptions {
  /** Total attempts per stage, including the first. */
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_STAGE_RETRY: StageRetryOptions = {
  maxAttempts: 2,
  initialDelayMs: 250,
  maxDelayMs: 2000,
};

/**
 * Retries a stage only after a transient GenerationFailure (timeout, rate
 * limit, 5xx, network). Everything else propagates on the first throw.
 */
export function createStageRetryPolicy(options: StageRetryOptions = DEFAULT_STAGE_RETRY): RetryPolicy {
  return retry(handleWhen(isTransientFailure), {
    maxAttempts: Math.max(0, options.maxAttempts - 1),
    backoff: new ExponentialBackoff({
      initialDelay: options.initialDelayMs,
      maxDelay: options.maxDelayMs,
    }),
  });
}
