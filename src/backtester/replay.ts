/**
 * Replay engine — drives the three analytics components over a recorded
 * tick stream the same way a live caller would:
 *
 *   tick → SweepModel.processTick
 *        → on a sweep: MeanReversionStrategy.onSweep(lastEvent)
 *   tick → MeanReversionStrategy.onTick(ts, price)
 *   tick → OrderFlowFeatureExtractor.addTrade (+ periodic getFrame), when enabled
 *
 * The components never see each other; this class is the mediator.
 */

import type { Logger } from '../core/logger.js';
import type { OrderFlowFrame, PositionDirection, StrategyAction, SweepEvent, Tick } from '../core/types.js';
import { OrderFlowFeatureExtractor } from '../features/orderFlow.js';
import { MeanReversionStrategy, type MeanReversionConfig } from '../strategy/meanReversion.js';
import { SweepModel } from '../sweep/sweepModel.js';
import { summarizeTrades, type ReplayTrade, type TradeSummary } from './metrics.js';

export interface ReplayConfig {
  sweep: {
    shortWindowSec: number;
    longWindowSec: number;
    thresholdRatio: number;
  };
  strategy: MeanReversionConfig;
  /** Sample an order-flow frame every N seconds of tick time; 0 disables. */
  featureSampleSec: number;
}

export interface ReplayResult {
  ticks: number;
  sweeps: number;
  opens: number;
  closes: number;
  events: SweepEvent[];
  trades: ReplayTrade[];
  frames: OrderFlowFrame[];
  summary: TradeSummary;
}

interface Entry {
  direction: PositionDirection;
  price: number;
  time: number;
}

export class ReplayEngine {
  constructor(
    private readonly config: ReplayConfig,
    private readonly logger: Logger
  ) {}

  run(ticks: Iterable<Tick>): ReplayResult {
    const { sweep, strategy: strategyConfig, featureSampleSec } = this.config;
    const model = new SweepModel(sweep.shortWindowSec, sweep.longWindowSec, sweep.thresholdRatio);
    const strategy = new MeanReversionStrategy(strategyConfig);
    const features = featureSampleSec > 0 ? new OrderFlowFeatureExtractor() : null;

    const events: SweepEvent[] = [];
    const trades: ReplayTrade[] = [];
    const frames: OrderFlowFrame[] = [];
    let entry: Entry | null = null;
    let tickCount = 0;
    let opens = 0;
    let closes = 0;
    let nextSampleTs: number | null = null;

    this.logger.info('replay started', { ...sweep, ...strategyConfig, featureSampleSec });

    const handle = (action: StrategyAction): void => {
      switch (action.kind) {
        case 'IDLE':
          return;
        case 'OPEN_LONG':
        case 'OPEN_SHORT':
          if (action.direction === 0) return;
          opens++;
          entry = { direction: action.direction, price: action.price, time: action.timestamp };
          this.logger.debug('position opened', { kind: action.kind, price: action.price, ts: action.timestamp });
          return;
        case 'CLOSE': {
          closes++;
          if (entry === null) {
            this.logger.warn('close without a recorded entry', { ts: action.timestamp });
            return;
          }
          const pnl = entry.direction === 1 ? action.price - entry.price : entry.price - action.price;
          const trade: ReplayTrade = {
            direction: entry.direction,
            entryPrice: entry.price,
            exitPrice: action.price,
            entryTime: entry.time,
            exitTime: action.timestamp,
            pnl,
            pnlBp: (pnl / entry.price) * 10000,
            reason: action.reason ?? 'timeout'
          };
          trades.push(trade);
          entry = null;
          this.logger.debug('position closed', { ...trade });
          return;
        }
      }
    };

    for (const tick of ticks) {
      tickCount++;

      const signal = model.processTick(tick);
      if (signal !== 'NO_SIGNAL') {
        const event = model.getLastEvent();
        events.push(event);
        this.logger.debug('sweep detected', { signal, ...event });
        handle(strategy.onSweep(event));
      }
      handle(strategy.onTick(tick.timestamp, tick.price));

      if (features !== null) {
        features.addTrade(tick.timestamp, tick.price, tick.volume, tick.side);
        if (nextSampleTs === null || tick.timestamp >= nextSampleTs) {
          frames.push(features.getFrame(tick.timestamp));
          nextSampleTs = tick.timestamp + featureSampleSec;
        }
      }
    }

    const summary = summarizeTrades(trades);
    this.logger.info('replay finished', {
      ticks: tickCount,
      sweeps: events.length,
      opens,
      closes,
      winRate: summary.winRate,
      cumPnl: summary.cumPnl
    });

    return { ticks: tickCount, sweeps: events.length, opens, closes, events, trades, frames, summary };
  }
}
