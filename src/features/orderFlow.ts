/**
 * Order-flow feature extractor — trade tape + L2 book → OrderFlowFrame.
 *
 * Keeps:
 *   - trades for the longest flow horizon (10s)
 *   - per-second aggression buckets (last 5s) for aggressor-run detection
 *   - bid/ask side maps
 *   - 20s / 30s rolling extrema of mid
 *
 * `getFrame` is the only place frames are built; it also prunes stale
 * history and feeds the current mid into the extrema.
 */

import { Deque } from '../core/deque.js';
import type {
  AggRunDirection,
  BookLevel,
  DepthBand,
  FlowWindow,
  OrderFlowFrame,
  Side,
  WeakSide
} from '../core/types.js';
import { OrderBook } from './orderBook.js';
import { RollingExtreme } from './rollingExtreme.js';

const TRADE_HORIZON_SEC = 10;
const BUCKET_RETENTION_SEC = 5;
const RUN_LENGTH = 3;
const RUN_BUY_SHARE = 0.7;
const RUN_SELL_SHARE = 0.3;
const WEAK_SIDE_FACTOR = 0.4;

export const DEPTH_BANDS = { depth01: 0.001, depth03: 0.003, depth05: 0.005 } as const;

interface TradePoint {
  ts: number;
  volume: number;
  side: Side;
}

interface AggBucket {
  sec: number; // floor(ts)
  buy: number;
  sell: number;
}

const emptyFlow = (): FlowWindow => ({ buyVolume: 0, sellVolume: 0, buyShare: 0, sellShare: 0 });
const emptyDepth = (): DepthBand => ({ bid: 0, ask: 0 });

export const emptyFrame = (ts = 0): OrderFlowFrame => ({
  ts,
  mid: 0,
  bestBid: 0,
  bestAsk: 0,
  flow1s: emptyFlow(),
  flow3s: emptyFlow(),
  flow10s: emptyFlow(),
  depth01: emptyDepth(),
  depth03: emptyDepth(),
  depth05: emptyDepth(),
  isNewHigh20s: false,
  isNewLow20s: false,
  isNewHigh30s: false,
  isNewLow30s: false,
  aggRunDir: 'none',
  weakSide01: 'none'
});

const toFlow = (buy: number, sell: number): FlowWindow => {
  const total = buy + sell;
  if (total <= 0) return { buyVolume: buy, sellVolume: sell, buyShare: 0, sellShare: 0 };
  const buyShare = buy / total;
  return { buyVolume: buy, sellVolume: sell, buyShare, sellShare: 1 - buyShare };
};

const bucketDirection = (b: AggBucket): AggRunDirection => {
  const total = b.buy + b.sell;
  if (total <= 0) return 'none';
  const net = b.buy - b.sell;
  const share = b.buy / total;
  if (net > 0 && share >= RUN_BUY_SHARE) return 'buy';
  if (net < 0 && share <= RUN_SELL_SHARE) return 'sell';
  return 'none';
};

export class OrderFlowFeatureExtractor {
  private readonly trades = new Deque<TradePoint>();
  private readonly buckets = new Deque<AggBucket>();
  private readonly book = new OrderBook();
  private readonly highLow20s = new RollingExtreme(20);
  private readonly highLow30s = new RollingExtreme(30);

  private lastPrice = 0;
  private lastTradeTs = 0;
  private aggRunDir: AggRunDirection = 'none';

  addTrade(ts: number, price: number, volume: number, side: Side): void {
    this.lastPrice = price;
    this.lastTradeTs = ts;
    this.trades.pushBack({ ts, volume, side });
    this.prune(ts);
    this.updateBucket(ts, volume, side);
    this.refreshAggRun(ts);
  }

  applyL2Snapshot(bids: readonly BookLevel[], asks: readonly BookLevel[]): void {
    this.book.applySnapshot(bids, asks);
  }

  applyL2Delta(bids: readonly BookLevel[], asks: readonly BookLevel[]): void {
    this.book.applyDelta(bids, asks);
  }

  /** Read-only view of the maintained book. */
  get orderBook(): OrderBook {
    return this.book;
  }

  /** Aggressor run as of the last trade or frame. */
  get aggressorRun(): AggRunDirection {
    return this.aggRunDir;
  }

  getFrame(tsNow = 0): OrderFlowFrame {
    const ts = tsNow > 0 ? tsNow : this.lastTradeTs;
    const frame = emptyFrame(ts);

    this.prune(ts);
    this.refreshAggRun(ts);

    let buy1 = 0, sell1 = 0, buy3 = 0, sell3 = 0, buy10 = 0, sell10 = 0;
    for (const t of this.trades) {
      const age = ts - t.ts;
      if (age < 0 || age > TRADE_HORIZON_SEC) continue;
      const isBuy = t.side === 'buy';
      if (isBuy) buy10 += t.volume;
      else sell10 += t.volume;
      if (age <= 3) {
        if (isBuy) buy3 += t.volume;
        else sell3 += t.volume;
      }
      if (age <= 1) {
        if (isBuy) buy1 += t.volume;
        else sell1 += t.volume;
      }
    }
    frame.flow1s = toFlow(buy1, sell1);
    frame.flow3s = toFlow(buy3, sell3);
    frame.flow10s = toFlow(buy10, sell10);

    frame.bestBid = this.book.bestBid();
    frame.bestAsk = this.book.bestAsk();
    frame.mid = frame.bestBid > 0 && frame.bestAsk > 0
      ? 0.5 * (frame.bestBid + frame.bestAsk)
      : this.lastPrice;

    if (frame.mid > 0) {
      frame.depth01 = this.book.depthWithin(frame.mid, DEPTH_BANDS.depth01);
      frame.depth03 = this.book.depthWithin(frame.mid, DEPTH_BANDS.depth03);
      frame.depth05 = this.book.depthWithin(frame.mid, DEPTH_BANDS.depth05);
    }
    frame.weakSide01 = this.weakSide(frame.depth01);

    if (frame.mid > 0) {
      this.highLow20s.add(ts, frame.mid);
      this.highLow30s.add(ts, frame.mid);
      frame.isNewHigh20s = !this.highLow20s.isEmpty() && frame.mid >= this.highLow20s.currentMax();
      frame.isNewLow20s = !this.highLow20s.isEmpty() && frame.mid <= this.highLow20s.currentMin();
      frame.isNewHigh30s = !this.highLow30s.isEmpty() && frame.mid >= this.highLow30s.currentMax();
      frame.isNewLow30s = !this.highLow30s.isEmpty() && frame.mid <= this.highLow30s.currentMin();
    }

    frame.aggRunDir = this.aggRunDir;
    return frame;
  }

  private weakSide(depth: DepthBand): WeakSide {
    if (depth.bid <= 0 || depth.ask <= 0) return 'none';
    if (depth.bid < WEAK_SIDE_FACTOR * depth.ask) return 'bid';
    if (depth.ask < WEAK_SIDE_FACTOR * depth.bid) return 'ask';
    return 'none';
  }

  private prune(tsNow: number): void {
    const cutoff = tsNow - TRADE_HORIZON_SEC;
    for (let t = this.trades.peekFront(); t !== undefined && t.ts < cutoff; t = this.trades.peekFront()) {
      this.trades.popFront();
    }
    this.pruneBuckets(Math.floor(tsNow));
  }

  private pruneBuckets(nowSec: number): void {
    const cutoffSec = nowSec - BUCKET_RETENTION_SEC;
    for (let b = this.buckets.peekFront(); b !== undefined && b.sec < cutoffSec; b = this.buckets.peekFront()) {
      this.buckets.popFront();
    }
  }

  private updateBucket(ts: number, volume: number, side: Side): void {
    const sec = Math.floor(ts);
    let bucket = this.buckets.peekBack();
    if (bucket === undefined || bucket.sec !== sec) {
      bucket = { sec, buy: 0, sell: 0 };
      this.buckets.pushBack(bucket);
    }
    if (side === 'buy') bucket.buy += volume;
    else bucket.sell += volume;
    this.pruneBuckets(sec);
  }

  /**
   * Looks at the last three complete buckets (second already closed as of
   * `refTs`). A run needs one shared direction and |net| non-decreasing
   * oldest to newest.
   */
  private refreshAggRun(refTs: number): void {
    this.aggRunDir = 'none';
    const refSec = Math.floor(refTs);
    const complete: AggBucket[] = [];
    for (let i = this.buckets.length - 1; i >= 0 && complete.length < RUN_LENGTH; i--) {
      const b = this.buckets.at(i);
      if (b !== undefined && b.sec < refSec) complete.unshift(b);
    }
    if (complete.length < RUN_LENGTH) return;

    const dirs = complete.map(bucketDirection);
    const first = dirs[0];
    if (first === undefined || first === 'none' || dirs.some((d) => d !== first)) return;

    const nets = complete.map((b) => Math.abs(b.buy - b.sell));
    for (let i = 1; i < nets.length; i++) {
      const prev = nets[i - 1];
      const cur = nets[i];
      if (prev === undefined || cur === undefined || prev > cur) return;
    }
    this.aggRunDir = first;
  }
}
