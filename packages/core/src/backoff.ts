export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
}

/**
 * Delay before the retry that follows `attempt` (1-based): base, 2×base, 4×base, ... capped at maxMs
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.baseMs * 2 ** exponent, policy.maxMs);
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
