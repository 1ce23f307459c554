/**
 * Replay statistics: trade summary, post-sweep forward returns and a small
 * distribution summary for them.
 */

import type { ExitReason, PositionDirection, SweepDirection, SweepEvent, Tick } from '../core/types.js';

export interface ReplayTrade {
  direction: PositionDirection;
  entryPrice: number;
  exitPrice: number;
  entryTime: number;
  exitTime: number;
  /** Price-unit PnL for one unit of size: (exit - entry) * direction. */
  pnl: number;
  pnlBp: number;
  reason: ExitReason;
}

export interface TradeSummary {
  totalTrades: number;
  wins: number;
  losses: number;
  /** Percent of trades with pnl > 0. */
  winRate: number;
  cumPnl: number;
  avgPnlBp: number;
  bestTradeBp: number;
  worstTradeBp: number;
  byReason: Record<ExitReason, number>;
}

export function summarizeTrades(trades: readonly ReplayTrade[]): TradeSummary {
  const byReason: Record<ExitReason, number> = {
    take_profit: 0,
    stop_loss: 0,
    timeout: 0,
    trend_continuation: 0
  };
  for (const t of trades) byReason[t.reason]++;

  if (trades.length === 0) {
    return {
      totalTrades: 0, wins: 0, losses: 0, winRate: 0,
      cumPnl: 0, avgPnlBp: 0, bestTradeBp: 0, worstTradeBp: 0,
      byReason,
    };
  }

  const wins = trades.filter((t) => t.pnl > 0).length;
  const losses = trades.filter((t) => t.pnl < 0).length;
  const bps = trades.map((t) => t.pnlBp);

  return {
    totalTrades: trades.length,
    wins,
    losses,
    winRate: (wins / trades.length) * 100,
    cumPnl: trades.reduce((sum, t) => sum + t.pnl, 0),
    avgPnlBp: bps.reduce((sum, v) => sum + v, 0) / bps.length,
    bestTradeBp: Math.max(...bps),
    worstTradeBp: Math.min(...bps),
    byReason,
  };
}

export interface ForwardReturn {
  direction: SweepDirection;
  /** Return from the first tick at/after the sweep to the last tick within the horizon. */
  ret: number;
  /** Best excursion in the sweep's direction. */
  mfe: number;
  /** Worst excursion against the sweep's direction. */
  mae: number;
  volumeTotal: number;
}

/** First index with timestamp >= ts, or ticks.length. */
function firstAtOrAfter(ticks: readonly Tick[], ts: number): number {
  let lo = 0;
  let hi = ticks.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const t = ticks[mid];
    if (t !== undefined && t.timestamp < ts) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Ticks must be sorted by timestamp. Events with no tick in range are skipped. */
export function forwardReturns(
  ticks: readonly Tick[],
  events: readonly SweepEvent[],
  horizonSec: number,
): ForwardReturn[] {
  const out: ForwardReturn[] = [];

  for (const ev of events) {
    const t1 = ev.tsEnd + horizonSec;
    const i0 = firstAtOrAfter(ticks, ev.tsEnd);
    const base = ticks[i0];
    if (base === undefined || base.timestamp > t1) continue;

    const p0 = base.price;
    let maxP = p0;
    let minP = p0;
    let last = base;
    for (let j = i0; j < ticks.length; j++) {
      const t = ticks[j];
      if (t === undefined || t.timestamp > t1) break;
      maxP = Math.max(maxP, t.price);
      minP = Math.min(minP, t.price);
      last = t;
    }

    const up = (maxP - p0) / p0;
    const down = (minP - p0) / p0;
    const isDown = ev.direction === 'down';
    out.push({
      direction: ev.direction,
      ret: (last.price - p0) / p0,
      mfe: isDown ? down : up,
      mae: isDown ? up : down,
      volumeTotal: ev.volumeTotal,
    });
  }
  return out;
}

export interface ReturnStats {
  count: number;
  mean: number;
  std: number;
  median: number;
  p5: number;
  p95: number;
}

/** Linear-interpolated quantile of an ascending array. */
function quantile(sorted: readonly number[], q: number): number {
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const a = sorted[lo] ?? 0;
  const b = sorted[hi] ?? a;
  return a + (b - a) * (pos - lo);
}

export function describeReturns(values: readonly number[]): ReturnStats {
  if (values.length === 0) return { count: 0, mean: 0, std: 0, median: 0, p5: 0, p95: 0 };

  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / values.length;
  const sorted = [...values].sort((a, b) => a - b);

  return {
    count: values.length,
    mean,
    std: Math.sqrt(variance),
    median: quantile(sorted, 0.5),
    p5: quantile(sorted, 0.05),
    p95: quantile(sorted, 0.95),
  };
}

export function formatReturnStats(label: string, s: ReturnStats): string {
  if (s.count === 0) return `${label}: count=0`;
  return (
    `${label}: count=${s.count}, mean=${s.mean.toFixed(6)}, std=${s.std.toFixed(6)}, ` +
    `med=${s.median.toFixed(6)}, 5%=${s.p5.toFixed(6)}, 95%=${s.p95.toFixed(6)}`
  );
}
