/**
 * rateLimiter.ts
 *
 * Spaces outbound API calls so no more than `calls` start in any `perMs`
 * span. Each call books its start time when it is scheduled, so callers
 * issued together (a month's tiles in parallel mode) queue behind each other
 * instead of all seeing the same free slot.
 */

export type RateLimit = {
  calls: number;
  perMs: number;
};

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class RateLimiter {
  /** Booked start times, ascending. */
  private readonly starts: number[] = [];
  private readonly calls: number;
  private readonly perMs: number;

  constructor(limit: RateLimit) {
    this.calls = Math.max(1, limit.calls);
    this.perMs = limit.perMs;
  }

  async execute<T>(task: () => Promise<T>): Promise<T> {
    const delay = this.book(Date.now());
    if (delay > 0) {
      await sleep(delay);
    }
    return task();
  }

  /** Books the earliest start that keeps the limit and returns how long to wait for it. */
  private book(now: number): number {
    while (this.starts.length > 0 && this.starts[0] <= now - this.perMs) {
      this.starts.shift();
    }

    const start =
      this.starts.length < this.calls
        ? now
        : Math.max(now, this.starts[this.starts.length - this.calls] + this.perMs);

    this.starts.push(start);
    return start - now;
  }
}

/** data.police.uk allows 15 requests per second. */
export const policeApiRateLimiter = new RateLimiter({ calls: 15, perMs: 1_000 });

/** Nominatim usage policy: one request per second. */
export const nominatimRateLimiter = new RateLimiter({ calls: 1, perMs: 1_000 });
