/**
 * Growable double-ended queue on a circular buffer.
 *
 * O(1) amortised push/pop at both ends. Capacity is kept at a power of two
 * so slot arithmetic is a mask instead of a modulo.
 */
export class Deque<T> implements Iterable<T> {
  private slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(initialCapacity = 16) {
    let cap = 4;
    while (cap < initialCapacity) cap *= 2;
    this.slots = new Array<T | undefined>(cap);
  }

  get length(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  pushBack(value: T): void {
    if (this.count === this.slots.length) this.grow();
    this.slots[(this.head + this.count) & (this.slots.length - 1)] = value;
    this.count++;
  }

  popFront(): T | undefined {
    if (this.count === 0) return undefined;
    const value = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) & (this.slots.length - 1);
    this.count--;
    return value;
  }

  popBack(): T | undefined {
    if (this.count === 0) return undefined;
    const idx = (this.head + this.count - 1) & (this.slots.length - 1);
    const value = this.slots[idx];
    this.slots[idx] = undefined;
    this.count--;
    return value;
  }

  peekFront(): T | undefined {
    return this.count === 0 ? undefined : this.slots[this.head];
  }

  peekBack(): T | undefined {
    return this.count === 0 ? undefined : this.slots[(this.head + this.count - 1) & (this.slots.length - 1)];
  }

  /** Element at position `index` counted from the front; negative counts from the back. */
  at(index: number): T | undefined {
    const i = index < 0 ? this.count + index : index;
    if (i < 0 || i >= this.count) return undefined;
    return this.slots[(this.head + i) & (this.slots.length - 1)];
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  toArray(): T[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.count; i++) {
      // Occupied slots hold a T, which may itself be undefined.
      yield this.slots[(this.head + i) & (this.slots.length - 1)] as T;
    }
  }

  private grow(): void {
    const next = new Array<T | undefined>(this.slots.length * 2);
    for (let i = 0; i < this.count; i++) {
      next[i] = this.slots[(this.head + i) & (this.slots.length - 1)];
    }
    this.slots = next;
    this.head = 0;
  }
}
