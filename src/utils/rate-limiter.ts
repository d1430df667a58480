import { sleep } from './retry.js';

/**
 * Spaces request starts at least `minIntervalMs` apart. Slots are reserved
 * when `waitForSlot` is called, so concurrent callers go in call order.
 */
export class RateLimiter {
  private nextSlotAt = 0;
  private readonly minIntervalMs: number;

  constructor(minIntervalMs: number) {
    this.minIntervalMs = Math.max(0, minIntervalMs);
  }

  async waitForSlot(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    if (slot > now) {
      await sleep(slot - now);
    }
  }
}
