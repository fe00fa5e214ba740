/**
 * Console formatting of per-symbol reports
 */

import type { SymbolReport } from './types';

/**
 * Progress line for one finished stock
 */
export function formatReport(report: SymbolReport, done: number, total: number): string {
  const progress = `[${done}/${total}]`;
  switch (report.status) {
    case 'ok': {
      const failed = report.failedWindows > 0 ? `, ${report.failedWindows} failed windows` : '';
      return `  ${progress} ✅ ${report.symbol}: ${report.count} candles (${report.firstDate} to ${report.lastDate}${failed})`;
    }
    case 'empty':
      return `  ${progress} ⚠️ ${report.symbol}: No data found`;
    case 'error':
      return `  ${progress} ❌ ${report.symbol}: Error - ${report.reason}`;
  }
}

/**
 * Final line when no stock returned any candles
 */
export function formatEmptyRun(inputPath: string): string {
  return `❌ No data fetched. Check your ${inputPath} identifiers.`;
}
