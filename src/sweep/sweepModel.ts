/**
 * Sweep Model — flags one-sided bursts of taker volume.
 *
 * Two nested time windows over the tick stream:
 *   - short window: the burst horizon (fractions of a second)
 *   - long window: the baseline horizon (tens of seconds)
 *
 * A burst fires when the short-window volume exceeds `thresholdRatio` times
 * what the long-window rate predicts for a short window. Firing is
 * edge-triggered: once in a sweep, nothing fires again until the ratio falls
 * below half the threshold.
 */

import { Deque } from '../core/deque.js';
import type { SweepDirection, SweepEvent, SweepSignal, Tick } from '../core/types.js';

/** A side must outweigh the other by this factor to give the burst a direction. */
const DIRECTION_DOMINANCE = 1.5;
/** Fraction of the trigger threshold below which detection re-arms. */
const REARM_FRACTION = 0.5;
/** Running totals closer to zero than this are subtraction residue. */
const VOLUME_EPSILON = 1e-12;

const EMPTY_EVENT: SweepEvent = {
  tsStart: 0,
  tsEnd: 0,
  priceStart: 0,
  priceEnd: 0,
  volumeTotal: 0,
  direction: 'none'
};

class TickWindow {
  readonly ticks = new Deque<Tick>();
  buyVolume = 0;
  sellVolume = 0;
  /** Last tick that aged out of this window. */
  lastEvicted: Tick | undefined;

  constructor(readonly lengthSec: number) {}

  get total(): number {
    return this.buyVolume + this.sellVolume;
  }

  evict(now: number): void {
    const cutoff = now - this.lengthSec;
    for (let head = this.ticks.peekFront(); head !== undefined && head.timestamp < cutoff; head = this.ticks.peekFront()) {
      this.ticks.popFront();
      this.account(head, -1);
      this.lastEvicted = head;
    }
    // Drop float residue once nothing is left to sum, or when only
    // zero-volume ticks remain.
    if (this.ticks.isEmpty() || Math.abs(this.buyVolume) < VOLUME_EPSILON) this.buyVolume = 0;
    if (this.ticks.isEmpty() || Math.abs(this.sellVolume) < VOLUME_EPSILON) this.sellVolume = 0;
  }

  push(tick: Tick): void {
    this.ticks.pushBack(tick);
    this.account(tick, 1);
  }

  clear(): void {
    this.ticks.clear();
    this.buyVolume = 0;
    this.sellVolume = 0;
    this.lastEvicted = undefined;
  }

  private account(tick: Tick, sign: 1 | -1): void {
    if (tick.side === 'buy') this.buyVolume += sign * tick.volume;
    else this.sellVolume += sign * tick.volume;
  }
}

export interface WindowTotals {
  shortBuy: number;
  shortSell: number;
  longBuy: number;
  longSell: number;
}

export class SweepModel {
  private readonly short: TickWindow;
  private readonly long: TickWindow;
  private sweeping = false;
  private lastEvent: SweepEvent = EMPTY_EVENT;

  constructor(
    readonly shortWindowSec = 0.3,
    readonly longWindowSec = 10.0,
    readonly thresholdRatio = 3.0
  ) {
    this.short = new TickWindow(shortWindowSec);
    this.long = new TickWindow(longWindowSec);
  }

  get inSweep(): boolean {
    return this.sweeping;
  }

  processTick(tick: Tick): SweepSignal {
    const now = tick.timestamp;

    this.short.evict(now);
    this.long.evict(now);
    this.short.push(tick);
    this.long.push(tick);

    const longTotal = this.long.total;
    if (longTotal <= 0) return 'NO_SIGNAL';

    const expectedShort = (longTotal / this.longWindowSec) * this.shortWindowSec;
    if (expectedShort <= 0) return 'NO_SIGNAL';

    const ratio = this.short.total / expectedShort;
    if (ratio < REARM_FRACTION * this.thresholdRatio) this.sweeping = false;

    if (this.sweeping || ratio < this.thresholdRatio) return 'NO_SIGNAL';

    this.sweeping = true;
    const direction = this.classify();
    if (direction === 'none') return 'NO_SIGNAL';

    this.lastEvent = this.snapshot(tick, direction);
    return direction === 'up' ? 'UP_SWEEP' : 'DOWN_SWEEP';
  }

  /** Last directional burst; a zeroed event with direction 'none' before the first. */
  getLastEvent(): SweepEvent {
    return { ...this.lastEvent };
  }

  shortWindowTicks(): Tick[] {
    return this.short.ticks.toArray();
  }

  longWindowTicks(): Tick[] {
    return this.long.ticks.toArray();
  }

  windowTotals(): WindowTotals {
    return {
      shortBuy: this.short.buyVolume,
      shortSell: this.short.sellVolume,
      longBuy: this.long.buyVolume,
      longSell: this.long.sellVolume
    };
  }

  reset(): void {
    this.short.clear();
    this.long.clear();
    this.sweeping = false;
    this.lastEvent = EMPTY_EVENT;
  }

  private classify(): SweepDirection {
    const { buyVolume, sellVolume } = this.short;
    if (buyVolume > sellVolume * DIRECTION_DOMINANCE) return 'up';
    if (sellVolume > buyVolume * DIRECTION_DOMINANCE) return 'down';
    return 'none';
  }

  private snapshot(tick: Tick, direction: SweepDirection): SweepEvent {
    const first = this.short.ticks.peekFront() ?? tick;
    const before = this.short.lastEvicted ?? first;
    return {
      tsStart: first.timestamp,
      tsEnd: tick.timestamp,
      priceStart: before.price,
      priceEnd: tick.price,
      volumeTotal: this.short.total,
      direction
    };
  }
}
