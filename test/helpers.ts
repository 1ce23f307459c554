/**
 * Shared test helpers — factories for ticks, events and loggers.
 */

import type { Logger } from '../src/core/logger.js';
import type { Side, SweepEvent, Tick } from '../src/core/types.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export const createMockLogger = (): Logger => ({
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
});

export const createRecordingLogger = (): Logger & { entries: Array<{ level: string; message: string }> } => {
  const entries: Array<{ level: string; message: string }> = [];
  return {
    entries,
    debug(message: string) { entries.push({ level: 'debug', message }); },
    info(message: string) { entries.push({ level: 'info', message }); },
    warn(message: string) { entries.push({ level: 'warn', message }); },
    error(message: string) { entries.push({ level: 'error', message }); },
  };
};

// ── Tick Factory ────────────────────────────────────────────────────

export function makeTick(overrides: Partial<Tick> = {}): Tick {
  return {
    timestamp: 0,
    price: 100,
    volume: 1,
    side: 'buy',
    ...overrides,
  };
}

/**
 * Evenly spaced ticks on one side.
 */
export function makeTickRun(
  count: number,
  opts: { start?: number; spacing?: number; side?: Side; volume?: number; price?: number | ((i: number) => number) } = {}
): Tick[] {
  const start = opts.start ?? 0;
  const spacing = opts.spacing ?? 1;
  const price = opts.price ?? 100;
  return Array.from({ length: count }, (_, i) => ({
    timestamp: start + i * spacing,
    price: typeof price === 'function' ? price(i) : price,
    volume: opts.volume ?? 1,
    side: opts.side ?? 'buy',
  }));
}

// ── Sweep Event Factory ─────────────────────────────────────────────

export function makeSweepEvent(overrides: Partial<SweepEvent> = {}): SweepEvent {
  return {
    tsStart: 99.7,
    tsEnd: 100,
    priceStart: 99.9,
    priceEnd: 100,
    volumeTotal: 10,
    direction: 'up',
    ...overrides,
  };
}
