/**
 * Anti-sweep mean reversion — fades a detected liquidity sweep.
 *
 * Flat → an up sweep opens a short, a down sweep opens a long, both at the
 * sweep's end price with the entry time pushed back by the execution delay.
 * In position → exits on take-profit, stop-loss or max hold (checked in
 * that order on every tick), or immediately when a second sweep continues
 * the move that opened the position.
 */

import type {
  ExitReason,
  PositionDirection,
  StrategyAction,
  SweepDirection,
  SweepEvent
} from '../core/types.js';

export interface MeanReversionConfig {
  /** Execution latency added to the sweep end time on entry. Default: 80 */
  delayMs: number;
  /** Max holding time in seconds. Default: 5 */
  holdSec: number;
  /** Take-profit in basis points. Default: 2 */
  takeProfitBp: number;
  /** Stop-loss in basis points. Default: 2 */
  stopLossBp: number;
}

export interface OpenPosition {
  direction: PositionDirection;
  entryPrice: number;
  entryTimestamp: number;
  /** Direction of the sweep that was faded. */
  sweepDirection: Exclude<SweepDirection, 'none'>;
}

export const DEFAULT_MEAN_REVERSION_CONFIG: MeanReversionConfig = {
  delayMs: 80,
  holdSec: 5,
  takeProfitBp: 2,
  stopLossBp: 2
};

// Absorbs float error in bp returns, e.g. 99.98 vs 100 gives 1.9999999999996bp.
const BP_EPSILON = 1e-6;

const idle = (): StrategyAction => ({ kind: 'IDLE', direction: 0, price: 0, timestamp: 0 });

export class MeanReversionStrategy {
  readonly name = 'sweep_mean_reversion';
  readonly config: MeanReversionConfig;
  private open: OpenPosition | null = null;

  constructor(config: Partial<MeanReversionConfig> = {}) {
    this.config = { ...DEFAULT_MEAN_REVERSION_CONFIG, ...config };
  }

  get inPosition(): boolean {
    return this.open !== null;
  }

  get position(): OpenPosition | null {
    return this.open === null ? null : { ...this.open };
  }

  onSweep(event: SweepEvent): StrategyAction {
    if (this.open !== null) {
      // Same direction again: the move is continuing against us.
      if (event.direction !== 'none' && event.direction === this.open.sweepDirection) {
        return this.close(event.tsEnd, event.priceEnd, 'trend_continuation');
      }
      return idle();
    }

    if (event.direction === 'none') return idle();

    const direction: PositionDirection = event.direction === 'up' ? -1 : 1;
    const timestamp = event.tsEnd + this.config.delayMs / 1000;
    this.open = {
      direction,
      entryPrice: event.priceEnd,
      entryTimestamp: timestamp,
      sweepDirection: event.direction
    };
    return {
      kind: direction === 1 ? 'OPEN_LONG' : 'OPEN_SHORT',
      direction,
      price: event.priceEnd,
      timestamp
    };
  }

  onTick(ts: number, price: number): StrategyAction {
    if (this.open === null) return idle();

    const { direction, entryPrice, entryTimestamp } = this.open;
    const retBp = ((price - entryPrice) / entryPrice) * 10000;
    const favorableBp = direction * retBp;

    if (favorableBp + BP_EPSILON >= this.config.takeProfitBp) {
      return this.close(ts, price, 'take_profit');
    }
    if (-favorableBp + BP_EPSILON >= this.config.stopLossBp) {
      return this.close(ts, price, 'stop_loss');
    }
    if (ts - entryTimestamp >= this.config.holdSec) {
      return this.close(ts, price, 'timeout');
    }
    return idle();
  }

  reset(): void {
    this.open = null;
  }

  private close(timestamp: number, price: number, reason: ExitReason): StrategyAction {
    const direction = this.open?.direction ?? 0;
    this.open = null;
    return { kind: 'CLOSE', direction, price, timestamp, reason };
  }
}
