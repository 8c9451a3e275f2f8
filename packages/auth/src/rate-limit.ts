import { LRUCache } from "lru-cache";

/**
 * Keyed counters with expiry. The in-process implementation below can be
 * replaced by a shared one when the API runs on several hosts.
 */
export interface RateLimitStore {
  /** Add one to `key` and return the new count. */
  increment(key: string, ttlMs: number): Promise<number>;
  get(key: string): Promise<number>;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until a request from the same client may succeed. */
  retryAfterSeconds: number;
}

export interface RateLimiter {
  consume(clientKey: string): Promise<RateLimitDecision>;
}

const STORE_MAX_KEYS = 10_000;

export class LruRateLimitStore implements RateLimitStore {
  private readonly counters: LRUCache<string, number>;

  constructor(maxKeys: number = STORE_MAX_KEYS) {
    this.counters = new LRUCache<string, number>({ max: maxKeys, ttlAutopurge: false });
  }

  async increment(key: string, ttlMs: number): Promise<number> {
    const next = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, next, { ttl: ttlMs });
    return next;
  }

  async get(key: string): Promise<number> {
    return this.counters.get(key) ?? 0;
  }
}

export interface WindowOptions {
  /** Counter namespace, e.g. "login" or "api". */
  name: string;
  limit: number;
  windowMs: number;
  store: RateLimitStore;
  now?: () => number;
}

/**
 * Fixed window: every request in the same window shares one counter, which
 * resets at the window boundary.
 */
export class FixedWindowLimiter implements RateLimiter {
  private readonly now: () => number;

  constructor(private readonly options: WindowOptions) {
    this.now = options.now ?? Date.now;
  }

  async consume(clientKey: string): Promise<RateLimitDecision> {
    const { name, limit, windowMs, store } = this.options;
    const now = this.now();
    const window = Math.floor(now / windowMs);
    const count = await store.increment(`${name}:${clientKey}:${String(window)}`, windowMs);
    const windowEnd = (window + 1) * windowMs;

    return {
      allowed: count <= limit,
      limit,
      remaining: Math.max(0, limit - count),
      retryAfterSeconds: Math.max(1, Math.ceil((windowEnd - now) / 1000)),
    };
  }
}

export interface SlidingWindowOptions extends WindowOptions {
  /** Number of segments the window is divided into. Default: 6 */
  segments?: number;
}

/**
 * Sliding window: the window is split into segments and a request is
 * admitted while the sum over the trailing `segments` segments, itself
 * included, stays within the limit. Every request counts, rejected ones too,
 * so a client that keeps retrying stays limited.
 */
export class SlidingWindowLimiter implements RateLimiter {
  private readonly now: () => number;
  private readonly segments: number;
  private readonly segmentMs: number;

  constructor(private readonly options: SlidingWindowOptions) {
    this.now = options.now ?? Date.now;
    this.segments = options.segments ?? 6;
    this.segmentMs = Math.ceil(options.windowMs / this.segments);
  }

  async consume(clientKey: string): Promise<RateLimitDecision> {
    const { name, limit, windowMs, store } = this.options;
    const now = this.now();
    const current = Math.floor(now / this.segmentMs);
    const segmentKey = (segment: number) => `${name}:${clientKey}:${String(segment)}`;

    // Increment before reading so concurrent requests cannot all see room.
    const own = await store.increment(segmentKey(current), windowMs + this.segmentMs);
    const previous: Promise<number>[] = [];
    for (let s = current - this.segments + 1; s < current; s++) {
      previous.push(store.get(segmentKey(s)));
    }
    const used = own + (await Promise.all(previous)).reduce((sum, n) => sum + n, 0);

    return {
      allowed: used <= limit,
      limit,
      remaining: Math.max(0, limit - used),
      retryAfterSeconds: Math.max(1, Math.ceil(((current + 1) * this.segmentMs - now) / 1000)),
    };
  }
}
