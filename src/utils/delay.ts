/**
 * Exponential backoff for the given attempt (1-based), capped at maxMs,
 * with up to ±jitterMs of random spread.
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number,
  multiplier = 2,
  jitterMs = 0,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(baseMs * Math.pow(multiplier, attempt - 1), maxMs);
  const jitter = (random() - 0.5) * 2 * jitterMs;
  return Math.max(0, Math.round(exponential + jitter));
}
