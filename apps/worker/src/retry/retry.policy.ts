import type { FailureType } from './failure-classifier';

export type RetryPolicy = {
  maxRetries: number;
  retryDelayBaseMs: number;
  retryDelayMaxMs: number;
};

/** min(base * 2^retryCount, max) */
export function computeRetryDelay(
  retryCount: number,
  policy: Pick<RetryPolicy, 'retryDelayBaseMs' | 'retryDelayMaxMs'>,
): number {
  return Math.min(
    policy.retryDelayBaseMs * 2 ** retryCount,
    policy.retryDelayMaxMs,
  );
}

/**
 * Determines if a job should be retried based on the retries already spent
 * and the failure type.
 */
export function shouldRetry(
  retryCount: number,
  maxRetries: number,
  failureType: FailureType,
): boolean {
  return failureType === 'retryable' && retryCount < maxRetries;
}
