/**
 * Concurrent fan-out over the roster
 *
 * Runs resolve → paginate → normalize for every roster entry on a bottleneck
 * limiter capped at workerCount concurrent pipelines. Each pipeline builds its
 * own provider client. Reports are delivered in completion order; a pipeline
 * that throws becomes an 'error' report and does not touch its siblings.
 */

import Bottleneck from 'bottleneck';
import type { FetchConfig } from '../config';
import type { CandleClientFactory } from '../data/providers';
import { resolveInstrumentKey } from '../data/instrumentKey';
import type { Roster, RosterEntry, SymbolReport } from '../types';
import { normalizeCandles } from './normalize';
import { paginateHistory } from './paginate';

export interface FanOutDeps {
  createClient: CandleClientFactory;
  onReport?: (report: SymbolReport, done: number, total: number) => void;
  now?: Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Full pipeline for one roster entry.
 *
 * @throws whatever pagination throws under onFetchError 'fail'
 */
export async function fetchSymbolHistory(
  entry: RosterEntry,
  config: FetchConfig,
  deps: FanOutDeps
): Promise<SymbolReport> {
  const instrumentKey = resolveInstrumentKey(entry.identifier, config.exchangePrefix);
  const client = deps.createClient(config);

  const pages = await paginateHistory(client, instrumentKey, {
    horizon: config.horizon,
    chunkSpanDays: config.chunkSpanDays,
    pacingDelayMs: config.pacingDelayMs,
    onFetchError: config.onFetchError,
    now: deps.now,
    sleep: deps.sleep,
  });

  const history = normalizeCandles(entry.symbol, pages.candles);
  const first = history.candles[0];
  const last = history.candles[history.candles.length - 1];
  if (first === undefined || last === undefined) {
    return { status: 'empty', symbol: entry.symbol, failedWindows: pages.failedWindows };
  }

  return {
    status: 'ok',
    symbol: entry.symbol,
    history,
    count: history.candles.length,
    firstDate: first.date.slice(0, 10),
    lastDate: last.date.slice(0, 10),
    failedWindows: pages.failedWindows,
  };
}

/**
 * Fetch every roster entry with at most config.workerCount pipelines in flight.
 *
 * @returns one report per roster entry, in completion order
 */
export async function fanOutRoster(
  roster: Roster,
  config: FetchConfig,
  deps: FanOutDeps
): Promise<SymbolReport[]> {
  const limiter = new Bottleneck({ maxConcurrent: config.workerCount });
  const reports: SymbolReport[] = [];
  const total = roster.length;

  const record = (report: SymbolReport): void => {
    reports.push(report);
    try {
      deps.onReport?.(report, reports.length, total);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`⚠️  Progress callback failed for ${report.symbol}: ${reason}`);
    }
  };

  await Promise.all(
    roster.map((entry) =>
      limiter
        .schedule(() => fetchSymbolHistory(entry, config, deps))
        .then(record, (error: unknown) => {
          const reason = error instanceof Error ? error.message : String(error);
          record({ status: 'error', symbol: entry.symbol, reason });
        })
    )
  );

  await limiter.stop({ dropWaitingJobs: false });
  return reports;
}
