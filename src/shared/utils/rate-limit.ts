interface KeyRateState {
  timestamps: number[];
}

export interface RateLimitDecision {
  allowed: boolean;
  retryAfterSeconds: number;
}

const MAX_TRACKED_KEYS = 10_000;

export class SlidingWindowRateLimiter {
  private readonly state = new Map<string, KeyRateState>();

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  checkAndConsume(key: string): RateLimitDecision {
    const now = this.now();
    const current = this.state.get(key) ?? { timestamps: [] };
    const filtered = current.timestamps.filter((timestamp) => now - timestamp < this.windowMs);

    if (filtered.length >= this.maxPerWindow) {
      const oldestInWindow = filtered[0] ?? now;
      const retryMs = Math.max(1_000, this.windowMs - (now - oldestInWindow));
      this.state.set(key, { timestamps: filtered });
      return {
        allowed: false,
        retryAfterSeconds: Math.ceil(retryMs / 1_000),
      };
    }

    filtered.push(now);
    this.state.delete(key);
    this.state.set(key, { timestamps: filtered });
    this.evictOldest();
    return {
      allowed: true,
      retryAfterSeconds: 0,
    };
  }

  private evictOldest(): void {
    while (this.state.size > MAX_TRACKED_KEYS) {
      const oldestKey = this.state.keys().next().value;
      if (typeof oldestKey !== "string") {
        return;
      }
      this.state.delete(oldestKey);
    }
  }
}
