#!/usr/bin/env tsx

/**
 * Offline replay - runs recorded ticks through sweep detection and the
 * mean-reversion strategy, then prints trade stats and post-sweep returns.
 * Usage: npm run replay -- [ticks.csv]
 */

import { loadConfig } from '../config/load.js';
import { JsonLogger } from '../core/logger.js';
import { loadTicksCsv } from '../data/tickCsv.js';
import { describeReturns, formatReturnStats, forwardReturns } from './metrics.js';
import { ReplayEngine, type ReplayResult } from './replay.js';

function printResults(path: string, result: ReplayResult): void {
  const { summary } = result;
  console.log(`\n${'='.repeat(60)}`);
  console.log(`Replay: ${path}`);
  console.log(`${'='.repeat(60)}`);
  console.log(`Ticks replayed:   ${result.ticks}`);
  console.log(`Sweeps detected:  ${result.sweeps}`);
  console.log(`Opens / closes:   ${result.opens} / ${result.closes}`);
  console.log(`Wins / losses:    ${summary.wins} / ${summary.losses}`);
  console.log(`Win rate:         ${summary.winRate.toFixed(1)}%`);
  console.log(`Cum PnL (mark):   ${summary.cumPnl.toFixed(6)}`);
  console.log(`Avg PnL:          ${summary.avgPnlBp.toFixed(2)}bp`);
  console.log(`Best / worst:     ${summary.bestTradeBp.toFixed(2)}bp / ${summary.worstTradeBp.toFixed(2)}bp`);
  console.log(
    `Exits:            tp=${summary.byReason.take_profit} sl=${summary.byReason.stop_loss} ` +
      `timeout=${summary.byReason.timeout} continuation=${summary.byReason.trend_continuation}`
  );
  console.log(`${'='.repeat(60)}\n`);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel, { component: 'replay' });
  const path = process.argv[2] ?? config.replay.ticksPath;

  try {
    const ticks = loadTicksCsv(path, { limit: config.replay.limit });
    logger.info('ticks loaded', { path, count: ticks.length });

    const engine = new ReplayEngine(
      { sweep: config.sweep, strategy: config.strategy, featureSampleSec: config.replay.featureSampleSec },
      logger
    );
    const result = engine.run(ticks);
    printResults(path, result);

    // Forward returns need time order; replay itself takes the file as-is.
    const sorted = [...ticks].sort((a, b) => a.timestamp - b.timestamp);
    const fwd = forwardReturns(sorted, result.events, config.analysis.horizonSec);
    const horizon = `${config.analysis.horizonSec}s`;
    console.log(formatReturnStats(`Down sweep ${horizon} ret`, describeReturns(fwd.filter((r) => r.direction === 'down').map((r) => r.ret))));
    console.log(formatReturnStats(`Up sweep ${horizon} ret  `, describeReturns(fwd.filter((r) => r.direction === 'up').map((r) => r.ret))));
  } catch (error) {
    logger.error('replay failed', { path, error: String(error) });
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error('Fatal replay error:', error);
    process.exit(1);
  });
}
