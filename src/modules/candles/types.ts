/**
 * Candle backfill module types
 *
 * Core type definitions shared by the roster, provider, engine and output layers.
 */

// One row of the input roster
export interface RosterEntry {
  symbol: string;
  identifier: string; // e.g. ISIN, resolved to a provider instrument key
}

export type Roster = RosterEntry[];

/**
 * Candle tuple as returned by the provider:
 * [timestamp, open, high, low, close, volume, openInterest]
 *
 * Open interest is absent for some instruments.
 */
export type RawCandle = [string, number, number, number, number, number, number?];

// Normalized daily candle
export interface Candle {
  date: string; // YYYY-MM-DD HH:mm:ss, timezone-naive wall-clock time
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  openInterest: number;
}

// Normalized, sorted, date-unique history for one symbol
export interface SymbolHistory {
  symbol: string;
  candles: Candle[];
}

// Closed calendar-date range requested in one provider call
export interface FetchWindow {
  start: Date;
  end: Date;
}

export type ChunkResult =
  | { ok: true; candles: RawCandle[] }
  | { ok: false; reason: string };

/**
 * Provider client for one pipeline. Implementations never reject:
 * every failure is reported as { ok: false }.
 */
export interface HistoricalCandleClient {
  fetchChunk(instrumentKey: string, window: FetchWindow): Promise<ChunkResult>;
}

export type IntervalUnit = 'minutes' | 'hours' | 'days' | 'weeks' | 'months';

/**
 * How far back pagination walks.
 *
 * - adaptive: walk back until stopYear, giving up on the first empty window
 *   whose end year is before guardYear
 * - fixed: walk back to floorDate, never stopping early
 */
export type HistoryHorizon =
  | { kind: 'adaptive'; stopYear: number; guardYear: number }
  | { kind: 'fixed'; floorDate: Date };

// What pagination does with a failed window
export type FetchErrorPolicy = 'empty' | 'fail';

export type OutputFormat = 'xlsx' | 'csv';

// Long-format output row
export interface LongRow extends Candle {
  symbol: string;
}

export interface Sheet {
  name: string;
  symbol: string;
  candles: Candle[];
}

export type Artifact =
  | { kind: 'empty' }
  | { kind: 'workbook'; sheets: Sheet[] }
  | { kind: 'table'; rows: LongRow[] };

export type SymbolReport =
  | {
      status: 'ok';
      symbol: string;
      history: SymbolHistory;
      count: number;
      firstDate: string;
      lastDate: string;
      failedWindows: number;
    }
  | { status: 'empty'; symbol: string; failedWindows: number }
  | { status: 'error'; symbol: string; reason: string };
