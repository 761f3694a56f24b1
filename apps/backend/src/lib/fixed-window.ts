interface WindowBucket {
  count: number
  resetAt: number
}

export interface FixedWindowOptions {
  windowMs: number
  max: number
  now?: () => number
}

export interface WindowDecision {
  allowed: boolean
  remaining: number
  resetAt: number
}

/**
 * Counts hits per key in fixed, non-overlapping windows. A hit over the limit is
 * refused and not counted.
 */
export class FixedWindowLimiter {
  private readonly buckets = new Map<string, WindowBucket>()
  private readonly windowMs: number
  private readonly max: number
  private readonly now: () => number

  constructor(options: FixedWindowOptions) {
    this.windowMs = options.windowMs
    this.max = options.max
    this.now = options.now ?? Date.now
  }

  get limit(): number {
    return this.max
  }

  take(key: string): WindowDecision {
    const now = this.now()
    this.sweep(now)

    const existing = this.buckets.get(key)
    const bucket: WindowBucket = existing && existing.resetAt > now ? existing : { count: 0, resetAt: now + this.windowMs }

    if (bucket.count >= this.max) {
      return { allowed: false, remaining: 0, resetAt: bucket.resetAt }
    }

    bucket.count += 1
    this.buckets.set(key, bucket)
    return { allowed: true, remaining: this.max - bucket.count, resetAt: bucket.resetAt }
  }

  forget(key: string): void {
    this.buckets.delete(key)
  }

  private sweep(now: number): void {
    if (this.buckets.size < 10_000) return
    for (const [key, bucket] of this.buckets.entries()) {
      if (bucket.resetAt <= now) {
        this.buckets.delete(key)
      }
    }
  }
}
