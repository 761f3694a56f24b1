const DEFAULT_MAX_BACKOFF_MS = 30_000

export interface BackoffOptions {
  baseMs: number
  /** 1 for the first retry */
  attempts: number
  maxMs?: number
  random?: () => number // injectable for testing
}

/**
 * Exponential backoff with jitter: base * 2^(attempts-1) + random(0, base),
 * capped at maxMs.
 *
 * The jitter spreads out retries of rows that failed together.
 */
export function calculateBackoffMs(options: BackoffOptions): number {
  const { baseMs, attempts, maxMs = DEFAULT_MAX_BACKOFF_MS, random = Math.random } = options

  const exponent = Math.max(0, attempts - 1)
  const exponential = baseMs * Math.pow(2, exponent)
  const jitter = random() * baseMs

  return Math.min(exponential + jitter, maxMs)
}
