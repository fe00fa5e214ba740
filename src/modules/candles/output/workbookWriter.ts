/**
 * Multi-sheet workbook sink
 *
 * One worksheet per symbol; the Date column comes first and plays the role
 * of the row index.
 */

import ExcelJS from 'exceljs';
import type { Sheet } from '../types';
import { writeAtomically } from './atomicWrite';

const DATE_FORMAT = 'yyyy-mm-dd hh:mm:ss';

/**
 * Naive "YYYY-MM-DD HH:mm:ss" as a Date whose UTC fields carry the wall-clock
 * time, which is how workbook cells store dates.
 */
export function toCellDate(naive: string): Date {
  return new Date(`${naive.replace(' ', 'T')}Z`);
}

export function buildWorkbook(sheets: Sheet[]): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();

  for (const sheet of sheets) {
    const worksheet = workbook.addWorksheet(sheet.name);
    worksheet.columns = [
      { header: 'Date', key: 'date', width: 20, style: { numFmt: DATE_FORMAT } },
      { header: 'Open', key: 'open', width: 12 },
      { header: 'High', key: 'high', width: 12 },
      { header: 'Low', key: 'low', width: 12 },
      { header: 'Close', key: 'close', width: 12 },
      { header: 'Volume', key: 'volume', width: 14 },
      { header: 'Open_Interest', key: 'openInterest', width: 14 },
    ];
    worksheet.addRows(
      sheet.candles.map((candle) => ({ ...candle, date: toCellDate(candle.date) }))
    );
  }

  return workbook;
}

export async function writeWorkbook(sheets: Sheet[], path: string): Promise<void> {
  const workbook = buildWorkbook(sheets);
  await writeAtomically(path, (tmpPath) => workbook.xlsx.writeFile(tmpPath));
}
