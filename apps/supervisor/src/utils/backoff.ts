export interface BackoffPolicy {
  /** Delay before the next dispatch; attempt is the one that just failed (1-indexed). */
  delay(attempt: number): number;
}

export function fixedBackoff(ms: number = 1000): BackoffPolicy {
  return { delay: () => ms };
}

// Exponential backoff: base-4 gives 1s → 4s → 16s → 64s (capped at maxInterval).
// attempt is 1-indexed; attempt=1 waits initialIntervalMs, attempt=2 waits 4x that, etc.
export function calculateBackOff(
  attempt: number,
  initialIntervalMs: number = 1000,
  backoffMultiplier: number = 4.0,
  maxInterval: number = 60000,
  jitterRatio: number = 0.1
): number {
  let delay = initialIntervalMs * Math.pow(backoffMultiplier, attempt - 1);
  delay = Math.min(delay, maxInterval);
  const jitter = delay * jitterRatio;
  const randomJitter = Math.random() * jitter * 2 - jitter;
  return Math.floor(delay + randomJitter);
}

export interface ExponentialBackoffOptions {
  initialMs?: number;
  multiplier?: number;
  maxMs?: number;
  jitter?: number;
}

export function exponentialBackoff(opts: ExponentialBackoffOptions = {}): BackoffPolicy {
  const { initialMs = 1000, multiplier = 4, maxMs = 60000, jitter = 0.1 } = opts;
  return { delay: (attempt) => calculateBackOff(attempt, initialMs, multiplier, maxMs, jitter) };
}
