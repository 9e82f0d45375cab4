/**
 * @description: Sliding-window in-memory rate limiter for the validation endpoint.
 * @groundcheck-scope: backend
 * @groundcheck-module: SimpleRateLimiter
 * @groundcheck-risk: low - Rate limiter failures could allow abuse but not data loss.
 */
// --- Types ---
type RateLimiterOptions = {
  limit: number;
  windowMs: number;
  now?: () => number;
};

type RateLimitResult = {
  allowed: boolean;
  retryAfter: number; // Seconds; 0 when allowed
  remaining: number;
};

// --- In-memory rate limiter ---
class SimpleRateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly requests = new Map<string, number[]>();

  constructor(options: RateLimiterOptions) {
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  check(identifier: string): RateLimitResult {
    const now = this.now();
    const recent = (this.requests.get(identifier) || []).filter(time => now - time < this.windowMs);

    if (recent.length >= this.limit) {
      // Retry once the oldest request in the window expires.
      const retryAfter = Math.max(1, Math.ceil((recent[0] + this.windowMs - now) / 1000));
      this.requests.set(identifier, recent);
      return { allowed: false, retryAfter, remaining: 0 };
    }

    recent.push(now);
    this.requests.set(identifier, recent);

    return { allowed: true, retryAfter: 0, remaining: this.limit - recent.length };
  }

  cleanup(): void {
    // Periodic sweep to drop stale identifiers.
    const now = this.now();
    for (const [identifier, requests] of this.requests.entries()) {
      const recent = requests.filter(time => now - time < this.windowMs);
      if (recent.length === 0) {
        this.requests.delete(identifier);
      } else {
        this.requests.set(identifier, recent);
      }
    }
  }

  get trackedIdentifiers(): number {
    return this.requests.size;
  }
}

export { SimpleRateLimiter };
export type { RateLimitResult, RateLimiterOptions };
