import { RateLimitedError } from '../utils/errors';

interface Window {
  startedAt: number;
  count: number;
}

const SWEEP_THRESHOLD = 1000;

/**
 * Fixed-window limiter: at most `limit` requests per key in each `windowMs` window.
 * Excess requests fail at once instead of queueing.
 */
export class RateLimiter {
  private limit: number;
  private windowMs: number;
  private now: () => number;
  private windows: Map<string, Window> = new Map();

  constructor(limit: number, windowMs: number = 60_000, now: () => number = Date.now) {
    this.limit = limit;
    this.windowMs = windowMs;
    this.now = now;
  }

  consume(key: string): void {
    const now = this.now();
    if (this.windows.size >= SWEEP_THRESHOLD) {
      this.sweep(now);
    }

    let window = this.windows.get(key);
    if (!window || now - window.startedAt >= this.windowMs) {
      window = { startedAt: now, count: 0 };
      this.windows.set(key, window);
    }

    if (window.count >= this.limit) {
      const retryAfterMs = window.startedAt + this.windowMs - now;
      console.warn(`[RateLimiter] Caller ${key} exceeded ${this.limit} requests per window`);
      throw new RateLimitedError(retryAfterMs);
    }
    window.count++;
  }

  remaining(key: string): number {
    const window = this.windows.get(key);
    if (!window || this.now() - window.startedAt >= this.windowMs) {
      return this.limit;
    }
    return Math.max(0, this.limit - window.count);
  }

  private sweep(now: number): void {
    for (const [key, window] of this.windows) {
      if (now - window.startedAt >= this.windowMs) {
        this.windows.delete(key);
      }
    }
  }
}
