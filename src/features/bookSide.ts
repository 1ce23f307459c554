/**
 * One side of an L2 book: price -> size, kept sorted by price ascending.
 * Sorted array of prices plus a Map for sizes; binary search for inserts,
 * deletes and range bounds.
 */
export class BookSide {
  private readonly prices: number[] = [];
  private readonly sizes = new Map<number, number>();

  get levelCount(): number {
    return this.prices.length;
  }

  get(price: number): number | undefined {
    return this.sizes.get(price);
  }

  /** Upserts the level, or deletes it when `size <= 0`. */
  set(price: number, size: number): void {
    if (size <= 0) {
      this.delete(price);
      return;
    }
    if (!this.sizes.has(price)) {
      this.prices.splice(this.lowerBound(price), 0, price);
    }
    this.sizes.set(price, size);
  }

  delete(price: number): void {
    if (!this.sizes.delete(price)) return;
    this.prices.splice(this.lowerBound(price), 1);
  }

  clear(): void {
    this.prices.length = 0;
    this.sizes.clear();
  }

  /** Highest price, or undefined when empty. */
  maxPrice(): number | undefined {
    return this.prices[this.prices.length - 1];
  }

  /** Lowest price, or undefined when empty. */
  minPrice(): number | undefined {
    return this.prices[0];
  }

  /** Total size at prices >= lower. */
  sizeAtOrAbove(lower: number): number {
    let total = 0;
    for (let i = this.lowerBound(lower); i < this.prices.length; i++) {
      total += this.sizeAt(i);
    }
    return total;
  }

  /** Total size at prices strictly below upper. */
  sizeBelow(upper: number): number {
    const end = this.lowerBound(upper);
    let total = 0;
    for (let i = 0; i < end; i++) {
      total += this.sizeAt(i);
    }
    return total;
  }

  /** Levels in ascending price order. */
  levels(): Array<[price: number, size: number]> {
    return this.prices.map((p): [number, number] => [p, this.sizes.get(p) ?? 0]);
  }

  private sizeAt(index: number): number {
    const price = this.prices[index];
    return price === undefined ? 0 : this.sizes.get(price) ?? 0;
  }

  /** First index whose price is >= target. */
  private lowerBound(target: number): number {
    let lo = 0;
    let hi = this.prices.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const price = this.prices[mid];
      if (price !== undefined && price < target) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
