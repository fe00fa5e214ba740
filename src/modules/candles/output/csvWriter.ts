/**
 * Long-format CSV sink
 */

import { writeFileSync } from 'fs';
import { stringify } from 'csv-stringify/sync';
import type { LongRow } from '../types';
import { writeAtomically } from './atomicWrite';

export const LONG_TABLE_COLUMNS = [
  { key: 'symbol', header: 'Symbol' },
  { key: 'date', header: 'Date' },
  { key: 'open', header: 'Open' },
  { key: 'high', header: 'High' },
  { key: 'low', header: 'Low' },
  { key: 'close', header: 'Close' },
  { key: 'volume', header: 'Volume' },
  { key: 'openInterest', header: 'Open_Interest' },
];

export function formatLongTable(rows: LongRow[]): string {
  return stringify(rows, { header: true, columns: LONG_TABLE_COLUMNS });
}

export async function writeLongTable(rows: LongRow[], path: string): Promise<void> {
  const content = formatLongTable(rows);
  await writeAtomically(path, (tmpPath) => writeFileSync(tmpPath, content, 'utf-8'));
}
