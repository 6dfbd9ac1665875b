/**
 * Sliding-window rate limiter.
 *
 * Tracks timestamps per key and rejects requests that exceed the
 * configured maximum within the time window.
 */
export class RateLimiter {
  private readonly timestamps = new Map<string, number[]>()

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Returns how many whole seconds `key` must wait before its next request,
   * or `null` when a request is allowed now. Does not record anything.
   */
  retryAfter(key: string): number | null {
    const recent = this.prune(key)
    if (recent.length < this.maxRequests) return null

    const oldest = recent[0] ?? this.now()
    const waitMs = this.windowMs - (this.now() - oldest)
    return Math.max(1, Math.ceil(waitMs / 1000))
  }

  /** Records a request for `key` at the current time. */
  record(key: string): void {
    const recent = this.prune(key)
    recent.push(this.now())
    this.timestamps.set(key, recent)
  }

  /**
   * Returns `true` if the request for `key` is within the rate limit.
   * Records the current timestamp when allowed.
   */
  isAllowed(key: string): boolean {
    if (this.retryAfter(key) !== null) return false
    this.record(key)
    return true
  }

  private prune(key: string): number[] {
    const cutoff = this.now() - this.windowMs
    const recent = (this.timestamps.get(key) ?? []).filter((ts) => ts > cutoff)
    this.timestamps.set(key, recent)
    return recent
  }
}
