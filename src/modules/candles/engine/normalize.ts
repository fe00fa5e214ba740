/**
 * Candle normalization
 *
 * Turns the unordered union of raw provider tuples for one symbol into a
 * date-sorted, date-unique candle list with typed fields.
 */

import type { Candle, LongRow, RawCandle, SymbolHistory } from '../types';

const TIMESTAMP_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?/;

/**
 * Parse a provider timestamp into timezone-naive "YYYY-MM-DD HH:mm:ss".
 *
 * The UTC offset is dropped, not applied: "2024-01-05T00:00:00+05:30"
 * becomes "2024-01-05 00:00:00" (exchange-local wall-clock time).
 *
 * @returns null when the timestamp is not a valid calendar date/time
 */
export function toNaiveTimestamp(value: string): string | null {
  const match = TIMESTAMP_RE.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h = '00', mi = '00', s = '00'] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  if (Number(h) > 23 || Number(mi) > 59 || Number(s) > 59) return null;

  return `${y}-${mo}-${d} ${h}:${mi}:${s}`;
}

/**
 * Plain code-unit ordering, independent of the locale's collation
 */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isPrice(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Convert one raw tuple, or null if any field is unusable
 */
export function toCandle(raw: RawCandle): Candle | null {
  const [timestamp, open, high, low, close, volume, openInterest = 0] = raw;
  const date = toNaiveTimestamp(timestamp);
  if (date === null) return null;
  if (![open, high, low, close, volume, openInterest].every(isPrice)) return null;

  return {
    date,
    open,
    high,
    low,
    close,
    volume: Math.trunc(volume),
    openInterest: Math.trunc(openInterest),
  };
}

/**
 * Sort by date ascending and keep the first candle of each date.
 *
 * The sort is stable, so "first" means first in input order.
 */
export function sortAndDedupe(candles: Candle[]): Candle[] {
  const sorted = [...candles].sort((a, b) => compareCodeUnits(a.date, b.date));
  const deduped: Candle[] = [];
  let lastDate: string | null = null;
  for (const candle of sorted) {
    if (candle.date === lastDate) continue;
    deduped.push(candle);
    lastDate = candle.date;
  }
  return deduped;
}

/**
 * Normalize everything fetched for one symbol.
 *
 * An empty input yields an empty history; that is a valid result, not a failure.
 */
export function normalizeCandles(symbol: string, raw: RawCandle[]): SymbolHistory {
  const candles: Candle[] = [];
  for (const tuple of raw) {
    const candle = toCandle(tuple);
    if (candle) candles.push(candle);
  }
  return { symbol, candles: sortAndDedupe(candles) };
}

/**
 * Long-format rows: symbol attached, canonical column order
 */
export function toLongRows(history: SymbolHistory): LongRow[] {
  return history.candles.map((candle) => ({
    symbol: history.symbol,
    date: candle.date,
    open: candle.open,
    high: candle.high,
    low: candle.low,
    close: candle.close,
    volume: candle.volume,
    openInterest: candle.openInterest,
  }));
}
