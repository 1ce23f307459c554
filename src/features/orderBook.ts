import type { BookLevel, DepthBand } from '../core/types.js';
import { BookSide } from './bookSide.js';

export class OrderBook {
  readonly bids = new BookSide();
  readonly asks = new BookSide();

  /** Replaces both sides. */
  applySnapshot(bids: readonly BookLevel[], asks: readonly BookLevel[]): void {
    this.bids.clear();
    this.asks.clear();
    this.merge(bids, asks);
  }

  /** Merges levels into both sides; size <= 0 removes a level. */
  applyDelta(bids: readonly BookLevel[], asks: readonly BookLevel[]): void {
    this.merge(bids, asks);
  }

  /** Highest bid, 0 when the bid side is empty. */
  bestBid(): number {
    return this.bids.maxPrice() ?? 0;
  }

  /** Lowest ask, 0 when the ask side is empty. */
  bestAsk(): number {
    return this.asks.minPrice() ?? 0;
  }

  isEmpty(): boolean {
    return this.bids.levelCount === 0 && this.asks.levelCount === 0;
  }

  /**
   * Bid size at prices >= lower plus ask size at prices < upper.
   * The lower bound is inclusive, the upper bound exclusive.
   */
  depthBetween(lower: number, upper: number): DepthBand {
    return {
      bid: this.bids.sizeAtOrAbove(lower),
      ask: this.asks.sizeBelow(upper)
    };
  }

  /** Depth within `pct` (0.001 = 0.1%) of `mid` on each side. */
  depthWithin(mid: number, pct: number): DepthBand {
    return this.depthBetween(mid * (1 - pct), mid * (1 + pct));
  }

  private merge(bids: readonly BookLevel[], asks: readonly BookLevel[]): void {
    for (const [price, size] of bids) this.bids.set(price, size);
    for (const [price, size] of asks) this.asks.set(price, size);
  }
}
