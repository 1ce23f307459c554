import { Deque } from '../core/deque.js';

interface Sample {
  ts: number;
  value: number;
}

/**
 * Sliding-window max/min over timestamped values.
 *
 * The max queue is kept decreasing from the front and the min queue
 * increasing, so the front of each is the current extreme. Insertion and
 * eviction are amortised O(1).
 */
export class RollingExtreme {
  private readonly maxQ = new Deque<Sample>();
  private readonly minQ = new Deque<Sample>();

  constructor(readonly windowSec: number) {}

  add(ts: number, value: number): void {
    for (let back = this.maxQ.peekBack(); back !== undefined && back.value <= value; back = this.maxQ.peekBack()) {
      this.maxQ.popBack();
    }
    this.maxQ.pushBack({ ts, value });

    for (let back = this.minQ.peekBack(); back !== undefined && back.value >= value; back = this.minQ.peekBack()) {
      this.minQ.popBack();
    }
    this.minQ.pushBack({ ts, value });

    this.evict(ts);
  }

  /** Drops samples older than `windowSec` before `tsNow`. */
  evict(tsNow: number): void {
    for (let front = this.maxQ.peekFront(); front !== undefined && tsNow - front.ts > this.windowSec; front = this.maxQ.peekFront()) {
      this.maxQ.popFront();
    }
    for (let front = this.minQ.peekFront(); front !== undefined && tsNow - front.ts > this.windowSec; front = this.minQ.peekFront()) {
      this.minQ.popFront();
    }
  }

  isEmpty(): boolean {
    return this.maxQ.isEmpty() || this.minQ.isEmpty();
  }

  currentMax(): number {
    return this.maxQ.peekFront()?.value ?? 0;
  }

  currentMin(): number {
    return this.minQ.peekFront()?.value ?? 0;
  }
}
