/**
 * Subject Tutor: Sliding-Window Rate Limiter
 *
 * Keeps the timestamps of recent calls per request kind and refuses a call
 * once the window already holds `limit` of them.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retry_after_seconds: number };

export class RateLimiter<K extends string = string> {
  private readonly windows = new Map<K, number[]>();

  constructor(
    private readonly limit: number,
    private readonly windowMs: number = 60_000,
    private readonly clock: () => number = Date.now
  ) {}

  private prune(kind: K, at: number): number[] {
    const recent = (this.windows.get(kind) ?? []).filter(time => at - time < this.windowMs);
    this.windows.set(kind, recent);
    return recent;
  }

  /**
   * Record a call if the window has room
   */
  acquire(kind: K): RateLimitDecision {
    const at = this.clock();
    const recent = this.prune(kind, at);

    if (recent.length >= this.limit) {
      const oldest = recent[0];
      const waitMs = oldest + this.windowMs - at;
      return { allowed: false, retry_after_seconds: Math.max(1, Math.ceil(waitMs / 1000)) };
    }

    recent.push(at);
    return { allowed: true, remaining: this.limit - recent.length };
  }

  /** Calls counted in the current window */
  usage(kind: K): number {
    return this.prune(kind, this.clock()).length;
  }

  reset(): void {
    this.windows.clear();
  }
}
