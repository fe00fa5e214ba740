import { describe, it, expect } from 'vitest';
import { aggregateResults, assignSheetNames, sanitizeSheetName, MAX_SHEET_NAME_LENGTH } from '../aggregate';
import type { Candle, SymbolHistory } from '../../types';

function candle(date: string, close = 100): Candle {
  return { date: `${date} 00:00:00`, open: close, high: close, low: close, close, volume: 1, openInterest: 0 };
}

describe('aggregateResults', () => {
  const histories: SymbolHistory[] = [
    { symbol: 'B', candles: [candle('2021-01-02'), candle('2021-01-01')] },
    { symbol: 'A', candles: [candle('2021-01-01')] },
  ];

  it('sorts the long table by symbol, then date', () => {
    const artifact = aggregateResults(histories, 'csv');
    if (artifact.kind !== 'table') throw new Error(`unexpected ${artifact.kind}`);

    expect(artifact.rows.map((row) => [row.symbol, row.date])).toEqual([
      ['A', '2021-01-01 00:00:00'],
      ['B', '2021-01-01 00:00:00'],
      ['B', '2021-01-02 00:00:00'],
    ]);
  });

  it('builds one sheet per symbol ordered by symbol', () => {
    const artifact = aggregateResults(histories, 'xlsx');
    if (artifact.kind !== 'workbook') throw new Error(`unexpected ${artifact.kind}`);

    expect(artifact.sheets.map((sheet) => sheet.name)).toEqual(['A', 'B']);
    expect(artifact.sheets[1]?.candles).toHaveLength(2);
  });

  it('gives reserved and quoted symbols usable sheet names', () => {
    const artifact = aggregateResults(
      [
        { symbol: 'History', candles: [candle('2021-01-01')] },
        { symbol: "'QUOTED'", candles: [candle('2021-01-01')] },
        { symbol: 'GOOD', candles: [candle('2021-01-01')] },
      ],
      'xlsx'
    );
    if (artifact.kind !== 'workbook') throw new Error(`unexpected ${artifact.kind}`);

    expect(artifact.sheets.map((sheet) => [sheet.name, sheet.symbol])).toEqual([
      ['QUOTED', "'QUOTED'"],
      ['GOOD', 'GOOD'],
      ['History~2', 'History'],
    ]);
  });

  it('ignores symbols without candles', () => {
    const artifact = aggregateResults([...histories, { symbol: 'C', candles: [] }], 'xlsx');
    if (artifact.kind !== 'workbook') throw new Error(`unexpected ${artifact.kind}`);
    expect(artifact.sheets.map((sheet) => sheet.symbol)).toEqual(['A', 'B']);
  });

  it('reports an empty result when nothing has data', () => {
    expect(aggregateResults([{ symbol: 'A', candles: [] }], 'csv')).toEqual({ kind: 'empty' });
    expect(aggregateResults([], 'xlsx')).toEqual({ kind: 'empty' });
  });
});

describe('sanitizeSheetName', () => {
  it('strips separators and truncates long names', () => {
    const symbol = 'NSE|EQ:SOME/VERY-LONG-COMPANY-NAME-LIMITED';
    const name = sanitizeSheetName(symbol);

    expect(name).toBe('NSEEQSOMEVERY-LONG-COMPANY-NAM');
    expect(name).toHaveLength(MAX_SHEET_NAME_LENGTH);
    expect(name).not.toMatch(/[|:/]/);
  });

  it('falls back to a placeholder when nothing is left', () => {
    expect(sanitizeSheetName('|/:')).toBe('Sheet');
  });

  it('strips apostrophes from both ends', () => {
    expect(sanitizeSheetName("'QUOTED'")).toBe('QUOTED');
    expect(sanitizeSheetName("DR'S")).toBe("DR'S");
    expect(sanitizeSheetName("''")).toBe('Sheet');
  });

  it('never ends in an apostrophe after truncation', () => {
    const symbol = `${'A'.repeat(29)}'B`;
    expect(sanitizeSheetName(symbol)).toBe('A'.repeat(29));
  });
});

describe('assignSheetNames', () => {
  it('suffixes names that collide after sanitizing', () => {
    expect(assignSheetNames(['A/B', 'AB', 'A:B'])).toEqual(['AB', 'AB~2', 'AB~3']);
  });

  it('suffixes the reserved History name', () => {
    expect(assignSheetNames(['History', 'GOOD', 'HISTORY'])).toEqual(['History~2', 'GOOD', 'HISTORY~3']);
  });

  it('keeps suffixed names within the length limit', () => {
    const long = 'X'.repeat(40);
    const names = assignSheetNames([long, `${long}|`]);
    expect(names[0]).toBe('X'.repeat(30));
    expect(names[1]).toBe(`${'X'.repeat(28)}~2`);
  });
});
