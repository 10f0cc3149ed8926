/**
 * Backoff policy for tile fetch retries.
 * Delay is a pure function of the attempt number so it can be tested alone.
 */

export interface BackoffPolicy {
  baseDelay: number;   // Milliseconds before the second attempt
  maxDelay: number;    // Upper bound before jitter
  jitter: number;      // 0 = deterministic, 1 = full jitter
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelay: 1000,
  maxDelay: 30000,
  jitter: 0.5,
};

/**
 * Delay to wait after a failed attempt
 * @param attempt Attempts made so far (1 after the first failure)
 * @param random Source in [0, 1), injectable for tests
 * @returns Milliseconds, rounded
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  if (attempt < 1) return 0;

  const exponential = Math.min(policy.maxDelay, policy.baseDelay * Math.pow(2, attempt - 1));
  const jitter = Math.max(0, Math.min(1, policy.jitter));

  return Math.round(exponential * (1 - jitter) + exponential * jitter * random());
}

/**
 * HTTP statuses worth retrying
 */
export function isRetriableStatus(status: number): boolean {
  return status >= 500 && status <= 599;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
