/**
 * Exponential backoff with jitter.
 *
 *   ceiling = min(maxMs, baseMs * 2^attempt)
 *   delay   = ceiling * (1 - jitter) + random() * ceiling * jitter
 *
 * The delay never exceeds `maxMs`.
 *
 * @module connection/backoff
 */

export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  /** Fraction of the ceiling that is randomised, 0..1. */
  jitter: number;
  random?: () => number;
}

export function computeBackoff(attempt: number, options: BackoffOptions): number {
  const random = options.random ?? Math.random;
  const exponent = Math.max(0, Math.min(attempt, 30));
  const ceiling = Math.min(options.maxMs, options.baseMs * 2 ** exponent);
  const jitter = Math.max(0, Math.min(options.jitter, 1));
  return Math.round(ceiling * (1 - jitter) + random() * ceiling * jitter);
}
