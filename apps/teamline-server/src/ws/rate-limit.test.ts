import { describe, it, expect } from "vitest";
import { RateLimiter } from "./rate-limit.js";

describe("RateLimiter", () => {
  it("allows up to max frames per window", () => {
    let now = 0;
    const limiter = new RateLimiter({ max: 2, windowMs: 1000 }, () => now);

    expect(limiter.check()).toBe(true);
    now = 10;
    expect(limiter.check()).toBe(true);
    now = 20;
    expect(limiter.check()).toBe(false);

    // first frame falls out of the window
    now = 1000;
    expect(limiter.check()).toBe(true);
    expect(limiter.check()).toBe(false);
  });
});
