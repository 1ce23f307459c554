#!/usr/bin/env tsx

/**
 * Detector parameter scan - grid search over sweep window and threshold
 * settings, reporting the sweep count and post-sweep forward returns for
 * each combination.
 * Usage: npm run scan -- [ticks.csv]
 */

import { loadConfig } from '../config/load.js';
import { JsonLogger, type Logger } from '../core/logger.js';
import type { SweepEvent, Tick } from '../core/types.js';
import { loadTicksCsv } from '../data/tickCsv.js';
import { SweepModel } from '../sweep/sweepModel.js';
import { describeReturns, formatReturnStats, forwardReturns, type ReturnStats } from './metrics.js';

export interface SweepParams {
  shortWindowSec: number;
  longWindowSec: number;
  thresholdRatio: number;
}

export interface SweepGrid {
  shortWindowSec: number[];
  longWindowSec: number[];
  thresholdRatio: number[];
}

export interface ParamScanRow {
  params: SweepParams;
  sweeps: number;
  down: ReturnStats;
  up: ReturnStats;
}

export const DEFAULT_SWEEP_GRID: SweepGrid = {
  shortWindowSec: [0.3, 0.6, 1.0],
  longWindowSec: [10, 30],
  thresholdRatio: [2, 3, 5]
};

/** Every combination of the grid, skipping those whose short window is not shorter than the long one. */
export function sweepGridCombos(grid: SweepGrid): SweepParams[] {
  const combos: SweepParams[] = [];
  for (const shortWindowSec of grid.shortWindowSec) {
    for (const longWindowSec of grid.longWindowSec) {
      if (shortWindowSec >= longWindowSec) continue;
      for (const thresholdRatio of grid.thresholdRatio) {
        combos.push({ shortWindowSec, longWindowSec, thresholdRatio });
      }
    }
  }
  return combos;
}

export function detectSweeps(ticks: readonly Tick[], params: SweepParams): SweepEvent[] {
  const model = new SweepModel(params.shortWindowSec, params.longWindowSec, params.thresholdRatio);
  const events: SweepEvent[] = [];
  for (const tick of ticks) {
    if (model.processTick(tick) !== 'NO_SIGNAL') events.push(model.getLastEvent());
  }
  return events;
}

export function runParamScan(
  ticks: readonly Tick[],
  grid: SweepGrid,
  horizonSec: number,
  logger: Logger
): ParamScanRow[] {
  const sorted = [...ticks].sort((a, b) => a.timestamp - b.timestamp);
  const combos = sweepGridCombos(grid);
  logger.info('param scan started', { ticks: sorted.length, combinations: combos.length, horizonSec });

  return combos.map((params, i) => {
    const events = detectSweeps(sorted, params);
    const fwd = forwardReturns(sorted, events, horizonSec);
    const row: ParamScanRow = {
      params,
      sweeps: events.length,
      down: describeReturns(fwd.filter((r) => r.direction === 'down').map((r) => r.ret)),
      up: describeReturns(fwd.filter((r) => r.direction === 'up').map((r) => r.ret))
    };
    logger.debug('param scan combination', { index: i + 1, ...params, sweeps: row.sweeps });
    return row;
  });
}

export function formatParamScanRow(row: ParamScanRow): string[] {
  const { shortWindowSec, longWindowSec, thresholdRatio } = row.params;
  return [
    `short=${shortWindowSec.toFixed(2)}s, long=${longWindowSec.toFixed(1)}s, ratio=${thresholdRatio} -> sweeps=${row.sweeps}`,
    `  ${formatReturnStats('Down', row.down)}`,
    `  ${formatReturnStats('Up  ', row.up)}`
  ];
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel, { component: 'param-scan' });
  const path = process.argv[2] ?? config.replay.ticksPath;

  try {
    const ticks = loadTicksCsv(path, { limit: config.replay.limit });
    const rows = runParamScan(ticks, DEFAULT_SWEEP_GRID, config.analysis.horizonSec, logger);
    for (const row of rows) {
      console.log('='.repeat(80));
      for (const line of formatParamScanRow(row)) console.log(line);
    }
  } catch (error) {
    logger.error('param scan failed', { path, error: String(error) });
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error('Fatal param scan error:', error);
    process.exit(1);
  });
}
