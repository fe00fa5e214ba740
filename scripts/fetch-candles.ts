/**
 * Candle backfill script
 *
 * Reads the stock roster (symbol + ISIN), fetches the full daily candle
 * history of every stock from Upstox and writes one artifact:
 * - .xlsx: one sheet per stock
 * - .csv: one long table sorted by symbol and date
 *
 * Configuration comes from CANDLES_* env vars (see src/modules/candles/config.ts).
 * Pagination is paced per stock and at most CANDLES_WORKERS stocks are fetched
 * at once, to stay under the provider rate limit.
 *
 * Usage: npm run fetch
 */

import './load-env';

import { existsSync } from 'fs';
import { arch } from 'os';
import { resolve } from 'path';
import { describeHorizon, loadFetchConfig } from '../src/modules/candles/config';
import { createCandleClient, loadRoster } from '../src/modules/candles/data';
import { runCandleJob } from '../src/modules/candles/job';
import { formatEmptyRun, formatReport } from '../src/modules/candles/report';

async function main() {
  const config = loadFetchConfig();
  console.log(`🚀 Starting candle backfill on ${arch()}...`);

  if (!existsSync(config.inputPath)) {
    console.error(`❌ '${config.inputPath}' not found.`);
    process.exit(1);
  }

  const roster = loadRoster(config.inputPath, config);

  console.log(`⚡ Fetching data for ${roster.length} stocks using ${config.workerCount} workers...`);
  console.log(
    `   (Interval: ${config.intervalValue} ${config.intervalUnit}, Horizon: ${describeHorizon(config.horizon)}, Output: ${config.outputFormat})`
  );

  const outcome = await runCandleJob(roster, config, {
    createClient: createCandleClient,
    onReport: (report, done, total) => console.log(formatReport(report, done, total)),
  });

  const failures = outcome.reports.filter((report) => report.status === 'error').length;
  const empties = outcome.reports.filter((report) => report.status === 'empty').length;

  if (outcome.kind === 'empty') {
    console.log(`\n${formatEmptyRun(config.inputPath)}`);
    if (failures > 0) console.log(`   ${failures} stocks failed with errors.`);
    return;
  }

  console.log(`\n💾 Saved ${outcome.symbols} stocks (${outcome.candles} candles) as ${config.outputFormat}`);
  if (empties > 0 || failures > 0) {
    console.log(`   Skipped: ${empties} without data, ${failures} with errors`);
  }
  console.log(`🎉 Done! File saved: ${resolve(outcome.path)}`);
}

main().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
