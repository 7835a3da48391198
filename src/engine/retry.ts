export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
  /** Spread each delay over [50%, 100%] of its nominal value. */
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  exponentialBase: 2,
  jitter: true
};

/**
 * Delay before retry number `attempt` (1 for the first retry). An upstream
 * `Retry-After` wins when it asks for longer than the computed backoff.
 */
export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  retryAfterMs?: number,
  random: () => number = Math.random
): number {
  const nominal = Math.min(
    policy.baseDelayMs * Math.pow(policy.exponentialBase, Math.max(0, attempt - 1)),
    policy.maxDelayMs
  );
  const delay = policy.jitter ? Math.round(nominal * (0.5 + random() * 0.5)) : nominal;

  return retryAfterMs !== undefined ? Math.max(delay, retryAfterMs) : delay;
}
