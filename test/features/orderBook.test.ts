import { describe, expect, it, beforeEach } from 'vitest';
import { BookSide } from '../../src/features/bookSide.js';
import { OrderBook } from '../../src/features/orderBook.js';

describe('BookSide', () => {
  let side: BookSide;

  beforeEach(() => {
    side = new BookSide();
  });

  it('keeps levels sorted regardless of insert order', () => {
    side.set(101, 1);
    side.set(99, 2);
    side.set(100, 3);
    expect(side.levels()).toEqual([[99, 2], [100, 3], [101, 1]]);
    expect(side.minPrice()).toBe(99);
    expect(side.maxPrice()).toBe(101);
  });

  it('upserts an existing level without duplicating it', () => {
    side.set(100, 1);
    side.set(100, 4);
    expect(side.levelCount).toBe(1);
    expect(side.get(100)).toBe(4);
  });

  it('deletes a level on size <= 0', () => {
    side.set(100, 1);
    side.set(101, 1);
    side.set(100, 0);
    side.set(101, -1);
    expect(side.levelCount).toBe(0);
    expect(side.maxPrice()).toBeUndefined();
  });

  it('ignores deletes of unknown prices', () => {
    side.set(100, 1);
    side.delete(50);
    expect(side.levels()).toEqual([[100, 1]]);
  });

  it('sums from an inclusive lower bound and below an exclusive upper bound', () => {
    side.set(99, 1);
    side.set(100, 2);
    side.set(101, 4);
    expect(side.sizeAtOrAbove(100)).toBe(6);
    expect(side.sizeAtOrAbove(100.5)).toBe(4);
    expect(side.sizeBelow(101)).toBe(3);
    expect(side.sizeBelow(99)).toBe(0);
  });
});

describe('OrderBook', () => {
  let book: OrderBook;

  beforeEach(() => {
    book = new OrderBook();
    book.applySnapshot(
      [[100, 5], [99, 3]],
      [[101, 4], [102, 2]],
    );
  });

  it('reports best levels from a snapshot', () => {
    expect(book.bestBid()).toBe(100);
    expect(book.bestAsk()).toBe(101);
  });

  it('returns 0 for an empty side', () => {
    const empty = new OrderBook();
    expect(empty.bestBid()).toBe(0);
    expect(empty.bestAsk()).toBe(0);
    expect(empty.isEmpty()).toBe(true);
  });

  it('includes a bid on the lower bound and excludes an ask on the upper bound', () => {
    expect(book.depthBetween(99.5, 101.0)).toEqual({ bid: 5, ask: 0 });
    expect(book.depthBetween(100, 101)).toEqual({ bid: 5, ask: 0 });
  });

  it('computes depth within a percentage band of mid', () => {
    // 0.5% of 100.5 -> [99.9975, 101.0025)
    expect(book.depthWithin(100.5, 0.005)).toEqual({ bid: 5, ask: 4 });
    expect(book.depthWithin(100.5, 0.001)).toEqual({ bid: 0, ask: 0 });
  });

  it('depth is non-decreasing as the band widens', () => {
    const bands = [0.001, 0.003, 0.005, 0.01, 0.02, 0.05];
    const depths = bands.map((p) => book.depthWithin(100.5, p));
    depths.slice(1).forEach((d, i) => {
      const prev = depths[i] ?? { bid: 0, ask: 0 };
      expect(d.bid).toBeGreaterThanOrEqual(prev.bid);
      expect(d.ask).toBeGreaterThanOrEqual(prev.ask);
    });
    expect(depths[depths.length - 1]).toEqual({ bid: 8, ask: 6 });
  });

  it('a snapshot replaces both sides', () => {
    book.applySnapshot([[98, 1]], []);
    expect(book.bestBid()).toBe(98);
    expect(book.bestAsk()).toBe(0);
    expect(book.bids.levelCount).toBe(1);
  });

  it('a delta merges, upserts and deletes', () => {
    book.applyDelta([[100, 0], [99.5, 7]], [[101, 1], [100.8, 2]]);
    expect(book.bestBid()).toBe(99.5);
    expect(book.bids.levels()).toEqual([[99, 3], [99.5, 7]]);
    expect(book.bestAsk()).toBe(100.8);
    expect(book.asks.get(101)).toBe(1);
  });
});
