/**
 * Upstox provider adapter
 *
 * Fetches historical candles from the Upstox v3 historical-candle API:
 *   GET /v3/historical-candle/{instrumentKey}/{unit}/{interval}/{toDate}/{fromDate}
 *
 * Each call covers one bounded date window. Failures are returned as
 * { ok: false, reason } and never thrown; callers decide what a failed
 * window means. No retries here: pacing is the caller's job.
 */

import type {
  ChunkResult,
  FetchWindow,
  HistoricalCandleClient,
  IntervalUnit,
  RawCandle,
} from '../../types';

export interface UpstoxClientOptions {
  baseUrl: string;
  intervalUnit: IntervalUnit;
  intervalValue: string;
  timeoutMs: number;
  accessToken?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Format a window bound as the calendar date the API expects (no time of day)
 */
export function toApiDate(date: Date): string {
  return date.toISOString().split('T')[0] ?? '';
}

export function buildHistoricalCandleUrl(
  baseUrl: string,
  instrumentKey: string,
  unit: IntervalUnit,
  interval: string,
  window: FetchWindow
): string {
  const key = encodeURIComponent(instrumentKey);
  return `${baseUrl}/v3/historical-candle/${key}/${unit}/${interval}/${toApiDate(window.end)}/${toApiDate(window.start)}`;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isRawCandle(value: unknown): value is RawCandle {
  if (!Array.isArray(value) || value.length < 6) {
    return false;
  }
  const [timestamp, ...numbers] = value;
  if (typeof timestamp !== 'string') {
    return false;
  }
  const [open, high, low, close, volume, openInterest] = numbers;
  return (
    [open, high, low, close, volume].every(isFiniteNumber) &&
    (openInterest === undefined || openInterest === null || isFiniteNumber(openInterest))
  );
}

/**
 * Pull the candle array out of a decoded response body.
 *
 * Expected shape: { status: "success", data: { candles: [[ts, o, h, l, c, v, oi], ...] } }
 */
export function extractCandles(body: unknown): ChunkResult {
  if (typeof body !== 'object' || body === null) {
    return { ok: false, reason: 'Invalid Upstox response format' };
  }
  if ('status' in body && body.status !== 'success') {
    return { ok: false, reason: `Upstox response status: ${String(body.status)}` };
  }
  const data = 'data' in body ? body.data : undefined;
  if (typeof data !== 'object' || data === null || !('candles' in data)) {
    return { ok: false, reason: 'Upstox response has no data.candles' };
  }
  const candles = data.candles;
  if (!Array.isArray(candles)) {
    return { ok: false, reason: 'Upstox data.candles is not an array' };
  }
  if (!candles.every(isRawCandle)) {
    return { ok: false, reason: 'Upstox data.candles contains malformed entries' };
  }

  return {
    ok: true,
    candles: candles.map((candle): RawCandle => {
      const [timestamp, open, high, low, close, volume, openInterest] = candle;
      return [timestamp, open, high, low, close, volume, openInterest ?? 0];
    }),
  };
}

/**
 * Client for one pipeline. Holds no state shared with other pipelines.
 */
export class UpstoxHistoryClient implements HistoricalCandleClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: UpstoxClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchChunk(instrumentKey: string, window: FetchWindow): Promise<ChunkResult> {
    const url = buildHistoricalCandleUrl(
      this.options.baseUrl,
      instrumentKey,
      this.options.intervalUnit,
      this.options.intervalValue,
      window
    );

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.options.accessToken) {
      headers.Authorization = `Bearer ${this.options.accessToken}`;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const response = await this.fetchImpl(url, { headers, signal: controller.signal });
      if (!response.ok) {
        return {
          ok: false,
          reason: `Upstox API error: ${response.status} ${response.statusText}`,
        };
      }
      const body: unknown = await response.json();
      return extractCandles(body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { ok: false, reason: `Upstox request failed: ${reason}` };
    } finally {
      clearTimeout(timeout);
    }
  }
}
