/**
 * Tick CSV reader for offline replay.
 *
 * Expected header: ts,price,volume,side  (`vol` is accepted for volume).
 * Side `B` / `Buy` is a buy; anything else is a sell.
 */

import fs from 'node:fs';
import { TickParseError } from '../core/errors.js';
import type { Side, Tick } from '../core/types.js';

export interface TickCsvOptions {
  /** Stop after this many rows; 0 reads everything. */
  limit?: number;
}

const parseSide = (raw: string): Side => (raw === 'B' || raw === 'Buy' ? 'buy' : 'sell');

export function parseTicksCsv(text: string, opts: TickCsvOptions = {}): Tick[] {
  const limit = opts.limit ?? 0;
  const lines = text.split(/\r?\n/);
  const header = (lines[0] ?? '').split(',').map((h) => h.trim());

  const col = (...names: string[]): number => {
    for (const name of names) {
      const idx = header.indexOf(name);
      if (idx >= 0) return idx;
    }
    throw new TickParseError(`Missing column: ${names.join(' or ')}`, { header });
  };
  const tsCol = col('ts');
  const priceCol = col('price');
  const volumeCol = col('volume', 'vol');
  const sideCol = col('side');

  const ticks: Tick[] = [];
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;
    const fields = line.split(',').map((f) => f.trim());

    const num = (idx: number, name: string): number => {
      const value = Number(fields[idx]);
      if (fields[idx] === undefined || fields[idx] === '' || !Number.isFinite(value)) {
        throw new TickParseError(`Invalid ${name} on line ${i + 1}`, { line: i + 1, value: fields[idx] });
      }
      return value;
    };

    ticks.push({
      timestamp: num(tsCol, 'ts'),
      price: num(priceCol, 'price'),
      volume: num(volumeCol, 'volume'),
      side: parseSide(fields[sideCol] ?? '')
    });
    if (limit > 0 && ticks.length >= limit) break;
  }
  return ticks;
}

export function loadTicksCsv(path: string, opts: TickCsvOptions = {}): Tick[] {
  return parseTicksCsv(fs.readFileSync(path, 'utf8'), opts);
}
