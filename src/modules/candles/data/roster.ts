/**
 * Roster loading
 *
 * Reads the symbol → identifier roster from a CSV file. Header names are
 * case-normalized, so "Symbol" and "ISIN_NUMBER" match the lower-case
 * column names in the config.
 */

import { readFileSync } from 'fs';
import { parse } from 'csv-parse/sync';
import type { Roster } from '../types';

export interface RosterColumns {
  symbolColumn: string;
  identifierColumn: string;
}

/**
 * Build a roster from CSV text.
 *
 * Rows with an empty symbol are skipped. When a symbol appears more than
 * once, the last row wins.
 *
 * @throws Error if the symbol or identifier column is missing
 */
export function parseRoster(text: string, columns: RosterColumns): Roster {
  const records: Record<string, string>[] = parse(text, {
    columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  if (records.length === 0) {
    return [];
  }

  const found = Object.keys(records[0] ?? {});
  for (const column of [columns.symbolColumn, columns.identifierColumn]) {
    if (!found.includes(column)) {
      throw new Error(
        `Roster is missing column "${column}" (found: ${found.join(', ') || 'none'})`
      );
    }
  }

  const bySymbol = new Map<string, string>();
  const duplicates: string[] = [];

  for (const record of records) {
    const symbol = record[columns.symbolColumn] ?? '';
    if (!symbol) continue;
    if (bySymbol.has(symbol)) duplicates.push(symbol);
    bySymbol.set(symbol, record[columns.identifierColumn] ?? '');
  }

  if (duplicates.length > 0) {
    console.warn(`⚠️  Duplicate roster symbols (last row wins): ${duplicates.join(', ')}`);
  }

  return Array.from(bySymbol, ([symbol, identifier]) => ({ symbol, identifier }));
}

/**
 * Load the roster file at path
 */
export function loadRoster(path: string, columns: RosterColumns): Roster {
  return parseRoster(readFileSync(path, 'utf-8'), columns);
}
