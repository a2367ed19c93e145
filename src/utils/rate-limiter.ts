/**
 * Request pacing for the Medium API
 *
 * Every caller reserves the next free slot before waiting, so overlapping
 * callers are spaced out the same way as sequential ones.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class RateLimiter {
  private nextSlot = 0;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  /** 0 or less disables pacing */
  constructor(requestsPerSecond: number, options: RateLimiterOptions = {}) {
    this.intervalMs = requestsPerSecond > 0 ? Math.ceil(1000 / requestsPerSecond) : 0;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  async waitForSlot(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    if (slot > now) {
      await this.sleep(slot - now);
    }
  }
}
