import { describe, it, expect } from "vitest";
import { FixedWindowLimiter, LruRateLimitStore, SlidingWindowLimiter } from "./rate-limit.js";

function clock(start: number) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe("LruRateLimitStore", () => {
  it("counts per key", async () => {
    const store = new LruRateLimitStore();
    expect(await store.increment("a", 1000)).toBe(1);
    expect(await store.increment("a", 1000)).toBe(2);
    expect(await store.get("a")).toBe(2);
    expect(await store.get("b")).toBe(0);
  });
});

describe("FixedWindowLimiter", () => {
  it("admits up to the limit and then rejects until the window resets", async () => {
    const c = clock(60_000);
    const limiter = new FixedWindowLimiter({
      name: "login",
      limit: 5,
      windowMs: 60_000,
      store: new LruRateLimitStore(),
      now: c.now,
    });

    for (let i = 0; i < 5; i++) {
      expect((await limiter.consume("1.2.3.4")).allowed).toBe(true);
    }

    c.advance(15_000);
    const rejected = await limiter.consume("1.2.3.4");
    expect(rejected.allowed).toBe(false);
    expect(rejected.remaining).toBe(0);
    expect(rejected.retryAfterSeconds).toBe(45);

    c.advance(45_000);
    expect((await limiter.consume("1.2.3.4")).allowed).toBe(true);
  });

  it("keeps clients independent", async () => {
    const limiter = new FixedWindowLimiter({
      name: "login",
      limit: 1,
      windowMs: 60_000,
      store: new LruRateLimitStore(),
      now: () => 0,
    });

    expect((await limiter.consume("a")).allowed).toBe(true);
    expect((await limiter.consume("b")).allowed).toBe(true);
    expect((await limiter.consume("a")).allowed).toBe(false);
  });
});

describe("SlidingWindowLimiter", () => {
  it("frees capacity segment by segment", async () => {
    const c = clock(0);
    const limiter = new SlidingWindowLimiter({
      name: "api",
      limit: 3,
      windowMs: 60_000,
      segments: 6,
      store: new LruRateLimitStore(),
      now: c.now,
    });

    // two requests in segment 0, one in segment 1
    expect((await limiter.consume("ip")).allowed).toBe(true);
    expect((await limiter.consume("ip")).allowed).toBe(true);
    c.advance(10_000);
    expect((await limiter.consume("ip")).remaining).toBe(0);

    const rejected = await limiter.consume("ip");
    expect(rejected.allowed).toBe(false);
    expect(rejected.retryAfterSeconds).toBe(10);

    // segment 0 leaves the window at t=60s; the rejection in segment 1 still counts
    c.advance(50_000);
    expect((await limiter.consume("ip")).allowed).toBe(true);
    expect((await limiter.consume("ip")).allowed).toBe(false);

    // segment 1 leaves at t=70s
    c.advance(10_000);
    expect((await limiter.consume("ip")).allowed).toBe(true);
  });

  it("counts rejected requests against the window", async () => {
    const c = clock(0);
    const limiter = new SlidingWindowLimiter({
      name: "api",
      limit: 2,
      windowMs: 60_000,
      store: new LruRateLimitStore(),
      now: c.now,
    });

    expect((await limiter.consume("ip")).allowed).toBe(true);
    c.advance(10_000);
    expect((await limiter.consume("ip")).remaining).toBe(0);
    c.advance(10_000);
    expect((await limiter.consume("ip")).allowed).toBe(false);

    // t=60s: the segment-1 request and the segment-2 rejection are both inside
    c.advance(40_000);
    expect((await limiter.consume("ip")).allowed).toBe(false);

    // t=80s: only the t=60s rejection remains
    c.advance(20_000);
    const admitted = await limiter.consume("ip");
    expect(admitted.allowed).toBe(true);
    expect(admitted.remaining).toBe(0);
  });
});
