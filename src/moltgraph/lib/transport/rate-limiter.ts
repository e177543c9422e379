export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const realSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));
export const realClock: Clock = () => Date.now();

/**
 * Enforces a minimum spacing between requests derived from a per-minute budget.
 *
 * Holds the only shared mutable state of the transport (the time of the last
 * request). Calls are expected to be awaited one at a time; running views in
 * parallel would need this turned into a guarded token bucket.
 */
export class RateLimiter {
  readonly minIntervalMs: number;
  private lastRequestAt = 0;

  constructor(
    requestsPerMinute: number,
    private readonly sleep: Sleep = realSleep,
    private readonly clock: Clock = realClock
  ) {
    this.minIntervalMs = 60_000 / Math.max(requestsPerMinute, 1);
  }

  /** Waits until the next request may be sent, then records it as sent. */
  async acquire(): Promise<void> {
    const elapsed = this.clock() - this.lastRequestAt;
    if (elapsed < this.minIntervalMs) {
      await this.sleep(this.minIntervalMs - elapsed);
    }
    this.lastRequestAt = this.clock();
  }
}
