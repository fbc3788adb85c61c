import { logger } from '../utils/logger/logger.service.js';

export type QueueTier = 'high' | 'low';

/**
 * Two FIFO tiers of URLs. `takeNext` always drains the high tier before
 * looking at the low one. A URL sits in at most one tier at a time.
 */
export class TwoTierQueue {
  private high: string[] = [];
  private low: string[] = [];

  get highSize(): number {
    return this.high.length;
  }

  get lowSize(): number {
    return this.low.length;
  }

  get size(): number {
    return this.high.length + this.low.length;
  }

  has(url: string): boolean {
    return this.high.includes(url) || this.low.includes(url);
  }

  /**
   * Appends to the tail of a tier, moving the URL out of the other tier.
   */
  enqueue(url: string, tier: QueueTier): void {
    this.remove(url);
    if (tier === 'high') {
      this.high.push(url);
    } else {
      this.low.push(url);
    }

    logger.debug(`Queued ${url} (${tier})`, { high: this.high.length, low: this.low.length });
  }

  remove(url: string): boolean {
    const before = this.size;
    this.high = this.high.filter((queued) => queued !== url);
    this.low = this.low.filter((queued) => queued !== url);
    return this.size !== before;
  }

  /**
   * Removes and returns the first URL the predicate accepts, high tier
   * first. Rejected URLs are dropped.
   */
  takeNext(accept: (url: string, tier: QueueTier) => boolean): { url: string; tier: QueueTier } | null {
    for (const tier of ['high', 'low'] as const) {
      const items = tier === 'high' ? this.high : this.low;
      while (items.length > 0) {
        const url = items.shift();
        if (url !== undefined && accept(url, tier)) {
          return { url, tier };
        }
      }
    }
    return null;
  }

  snapshot(): { high: string[]; low: string[] } {
    return { high: [...this.high], low: [...this.low] };
  }

  clear(): void {
    this.high = [];
    this.low = [];
  }
}
