/**
 * Minimum-interval rate limiter for the Treasury Fiscal Data API.
 * The API needs no key; we stay polite at ~5 requests per second.
 *
 * Slots are reserved synchronously, so concurrent callers are spaced
 * out in the order they called acquire().
 */

export class RateLimiter {
  private nextSlot = 0;
  private readonly intervalMs: number;

  constructor(
    requestsPerSecond: number = 5,
    private readonly clock: () => number = Date.now
  ) {
    this.intervalMs = requestsPerSecond > 0 ? 1000 / requestsPerSecond : 0;
  }

  async acquire(): Promise<void> {
    const now = this.clock();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await new Promise(resolve => setTimeout(resolve, waitMs));
    }
  }
}
