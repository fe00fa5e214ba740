/**
 * Backward pagination
 *
 * The provider only answers bounded date ranges and we do not know when a
 * stock started trading, so history is collected by walking backwards from
 * today in windows of chunkSpanDays until the configured horizon.
 *
 * Two horizons:
 * - adaptive: keep going until stopYear. An empty window ends the walk only
 *   once its end year is before guardYear; later empty windows are treated
 *   as halts or listing gaps and skipped. A stock with an empty stretch that
 *   straddles guardYear loses whatever history lies before it.
 * - fixed: always walk back to floorDate, clamping the last window to it.
 *   Windows are contiguous (each ends the day before the previous one starts).
 *
 * Requests of one walk are paced: the engine sleeps pacingDelayMs between
 * consecutive windows.
 */

import type {
  FetchErrorPolicy,
  FetchWindow,
  HistoricalCandleClient,
  HistoryHorizon,
  RawCandle,
} from '../types';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PaginationOptions {
  horizon: HistoryHorizon;
  chunkSpanDays: number;
  pacingDelayMs: number;
  onFetchError: FetchErrorPolicy;
  now?: Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface PaginationResult {
  candles: RawCandle[]; // unordered union of every window
  windows: FetchWindow[]; // in request order
  failedWindows: number;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function addUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Window ending at end, or null once the horizon has been reached.
 */
export function planWindow(end: Date, horizon: HistoryHorizon, chunkSpanDays: number): FetchWindow | null {
  if (horizon.kind === 'adaptive') {
    if (end.getUTCFullYear() < horizon.stopYear) return null;
    return { start: addUtcDays(end, -chunkSpanDays), end };
  }

  if (end.getTime() < horizon.floorDate.getTime()) return null;
  const start = addUtcDays(end, -chunkSpanDays);
  return {
    start: start.getTime() < horizon.floorDate.getTime() ? horizon.floorDate : start,
    end,
  };
}

/**
 * Where the next window ends after fetching window, or null to stop.
 */
export function nextWindowEnd(
  window: FetchWindow,
  gotCandles: boolean,
  horizon: HistoryHorizon
): Date | null {
  if (horizon.kind === 'adaptive') {
    if (!gotCandles && window.end.getUTCFullYear() < horizon.guardYear) return null;
    return window.start;
  }

  if (window.start.getTime() <= horizon.floorDate.getTime()) return null;
  return addUtcDays(window.start, -1);
}

/**
 * Collect the full available history of one instrument.
 *
 * @throws Error when onFetchError is 'fail' and a window fails
 */
export async function paginateHistory(
  client: HistoricalCandleClient,
  instrumentKey: string,
  options: PaginationOptions
): Promise<PaginationResult> {
  const { horizon, chunkSpanDays, pacingDelayMs, onFetchError } = options;
  const sleep = options.sleep ?? defaultSleep;

  const candles: RawCandle[] = [];
  const windows: FetchWindow[] = [];
  let failedWindows = 0;

  let end: Date | null = startOfUtcDay(options.now ?? new Date());

  while (end !== null) {
    const window = planWindow(end, horizon, chunkSpanDays);
    if (window === null) break;

    if (windows.length > 0) {
      await sleep(pacingDelayMs);
    }
    windows.push(window);

    const result = await client.fetchChunk(instrumentKey, window);
    let received = 0;
    if (result.ok) {
      received = result.candles.length;
      candles.push(...result.candles);
    } else {
      failedWindows++;
      if (onFetchError === 'fail') {
        throw new Error(result.reason);
      }
    }

    end = nextWindowEnd(window, received > 0, horizon);
  }

  return { candles, windows, failedWindows };
}
