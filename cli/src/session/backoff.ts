export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Retries allowed after a connection is lost, before the session gives up. */
  maxAttempts: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 10,
};

/** Delay before retry number `attempt` (zero-based). */
export function backoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF
): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
}
