/**
 * Result aggregation
 *
 * Merges per-symbol histories into the artifact the sink writes: one sheet
 * per symbol, or one long table sorted by (symbol, date).
 */

import type { Artifact, LongRow, OutputFormat, Sheet, SymbolHistory } from '../types';
import { compareCodeUnits, toLongRows } from './normalize';

export const MAX_SHEET_NAME_LENGTH = 30;

// Characters a workbook sheet name may not contain
const SHEET_NAME_FORBIDDEN = /[|:/\\?*[\]]/g;

// A sheet name may not start or end with an apostrophe
const SHEET_NAME_EDGES = /^[\s']+|[\s']+$/g;

// Names the workbook format keeps for itself (lower-cased)
const RESERVED_SHEET_NAMES = ['history'];

/**
 * Strip separator characters and edge apostrophes, and cap the length.
 *
 * e.g. "NSE:ABC|XYZ/PART" -> "NSEABCXYZPART", "'QUOTED'" -> "QUOTED"
 */
export function sanitizeSheetName(symbol: string): string {
  const cleaned = symbol
    .replace(SHEET_NAME_FORBIDDEN, '')
    .replace(SHEET_NAME_EDGES, '')
    .slice(0, MAX_SHEET_NAME_LENGTH)
    .replace(SHEET_NAME_EDGES, '');
  return cleaned || 'Sheet';
}

/**
 * Sanitize every name and suffix collisions with ~2, ~3, ...
 * (compared case-insensitively, as workbooks do). Reserved names count as taken.
 */
export function assignSheetNames(symbols: string[]): string[] {
  const taken = new Set<string>(RESERVED_SHEET_NAMES);
  return symbols.map((symbol) => {
    const base = sanitizeSheetName(symbol);
    let name = base;
    for (let n = 2; taken.has(name.toLowerCase()); n++) {
      const suffix = `~${n}`;
      name = `${base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length)}${suffix}`;
    }
    taken.add(name.toLowerCase());
    return name;
  });
}

/**
 * Sort long rows by symbol, then date
 */
export function sortLongRows(rows: LongRow[]): LongRow[] {
  return [...rows].sort(
    (a, b) => compareCodeUnits(a.symbol, b.symbol) || compareCodeUnits(a.date, b.date)
  );
}

/**
 * Build the final artifact.
 *
 * Histories without candles are ignored; if none remain the artifact is
 * { kind: 'empty' } and nothing should be written.
 */
export function aggregateResults(histories: SymbolHistory[], format: OutputFormat): Artifact {
  const nonEmpty = histories.filter((history) => history.candles.length > 0);
  if (nonEmpty.length === 0) {
    return { kind: 'empty' };
  }

  if (format === 'csv') {
    return { kind: 'table', rows: sortLongRows(nonEmpty.flatMap(toLongRows)) };
  }

  const ordered = [...nonEmpty].sort((a, b) => compareCodeUnits(a.symbol, b.symbol));
  const names = assignSheetNames(ordered.map((history) => history.symbol));
  const sheets: Sheet[] = ordered.map((history, i) => ({
    name: names[i] ?? sanitizeSheetName(history.symbol),
    symbol: history.symbol,
    candles: history.candles,
  }));
  return { kind: 'workbook', sheets };
}
