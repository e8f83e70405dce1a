import type { RateLimitConfig } from "../config.js";

/** Sliding-window limit on inbound frames for one connection */
export class RateLimiter {
  private timestamps: number[] = [];

  constructor(
    private readonly limit: RateLimitConfig,
    private readonly now: () => number = Date.now
  ) {}

  /** Returns true if the frame is allowed */
  check(): boolean {
    const now = this.now();
    this.timestamps = this.timestamps.filter((t) => now - t < this.limit.windowMs);

    if (this.timestamps.length >= this.limit.max) {
      return false;
    }

    this.timestamps.push(now);
    return true;
  }
}
