/**
 * Bounded exponential backoff shared by every blocking remote call.
 *
 * Attempt numbers are zero-based: the delay before retrying attempt `n` is
 * `baseDelayMs * factor^n`, capped at `maxDelayMs`.
 */
export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor?: number;
  /** Fraction of the delay (0..1) randomly shaved off to spread retries. */
  jitter?: number;
}

export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const factor = policy.factor ?? 2;
  const raw = Math.min(policy.baseDelayMs * factor ** attempt, policy.maxDelayMs);
  const jitter = policy.jitter ?? 0;
  if (jitter <= 0) return raw;
  return Math.round(raw * (1 - jitter * random()));
}

export function hasAttemptsLeft(policy: RetryPolicy, attempt: number): boolean {
  return attempt < policy.maxAttempts - 1;
}
