/**
 * Candle backfill configuration
 *
 * Builds one immutable FetchConfig at startup from environment variables
 * (loaded from .env.local / .env by scripts/load-env). Every value has a default;
 * invalid values are reported and replaced by the default.
 *
 * Env vars:
 * - CANDLES_INPUT_PATH, CANDLES_OUTPUT_PATH, CANDLES_OUTPUT_FORMAT (xlsx|csv)
 * - CANDLES_SYMBOL_COLUMN, CANDLES_IDENTIFIER_COLUMN
 * - CANDLES_EXCHANGE_PREFIX, CANDLES_INTERVAL_UNIT, CANDLES_INTERVAL_VALUE
 * - CANDLES_WORKERS, CANDLES_CHUNK_DAYS, CANDLES_PACING_MS, CANDLES_REQUEST_TIMEOUT_MS
 * - CANDLES_HORIZON (adaptive|fixed), CANDLES_STOP_YEAR, CANDLES_GUARD_YEAR, CANDLES_FLOOR_DATE
 * - CANDLES_ON_FETCH_ERROR (empty|fail)
 * - UPSTOX_API_BASE_URL, UPSTOX_ACCESS_TOKEN
 */

import { extname } from 'path';
import type { FetchErrorPolicy, HistoryHorizon, IntervalUnit, OutputFormat } from './types';

export interface FetchConfig {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly outputFormat: OutputFormat;
  readonly symbolColumn: string;
  readonly identifierColumn: string;
  readonly exchangePrefix: string;
  readonly intervalUnit: IntervalUnit;
  readonly intervalValue: string;
  readonly workerCount: number;
  readonly chunkSpanDays: number;
  readonly pacingDelayMs: number;
  readonly requestTimeoutMs: number;
  readonly horizon: Readonly<HistoryHorizon>;
  readonly onFetchError: FetchErrorPolicy;
  readonly apiBaseUrl: string;
  readonly accessToken?: string;
}

export type Env = Record<string, string | undefined>;

const INTERVAL_UNITS: readonly IntervalUnit[] = ['minutes', 'hours', 'days', 'weeks', 'months'];

export const DEFAULT_INPUT_PATH = 'Stock.csv';
export const DEFAULT_OUTPUT_PATH = 'Stock_Candle_Data_Final.xlsx';
export const DEFAULT_EXCHANGE_PREFIX = 'NSE_EQ|';
export const DEFAULT_WORKERS = 4;
export const DEFAULT_CHUNK_DAYS = 365 * 3;
export const DEFAULT_PACING_MS = 500;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const DEFAULT_STOP_YEAR = 2000;
export const DEFAULT_GUARD_YEAR = 2010;
export const DEFAULT_FLOOR_DATE = '2010-01-01';
export const DEFAULT_API_BASE_URL = 'https://api.upstox.com';

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return raw.trim();
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed)) {
    console.warn(`⚠️  Invalid ${name}="${raw}". Defaulting to ${fallback}.`);
    return fallback;
  }
  return Math.max(min, parsed);
}

function readChoice<T extends string>(
  env: Env,
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    console.warn(`⚠️  Invalid ${name}="${raw}". Expected one of ${choices.join('|')}. Defaulting to ${fallback}.`);
    return fallback;
  }
  return match;
}

/**
 * Parse a YYYY-MM-DD string as a UTC calendar date.
 *
 * @returns the date, or null when the string is not a real calendar date
 */
export function parseCalendarDate(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (date.toISOString().slice(0, 10) !== value.trim()) {
    return null;
  }
  return date;
}

function readHorizon(env: Env): HistoryHorizon {
  const kind = readChoice(env, 'CANDLES_HORIZON', ['adaptive', 'fixed'] as const, 'adaptive');
  if (kind === 'adaptive') {
    return {
      kind,
      stopYear: readInt(env, 'CANDLES_STOP_YEAR', DEFAULT_STOP_YEAR, 1900),
      guardYear: readInt(env, 'CANDLES_GUARD_YEAR', DEFAULT_GUARD_YEAR, 1900),
    };
  }

  const rawFloor = readString(env, 'CANDLES_FLOOR_DATE', DEFAULT_FLOOR_DATE);
  let floorDate = parseCalendarDate(rawFloor);
  if (floorDate === null) {
    console.warn(`⚠️  Invalid CANDLES_FLOOR_DATE="${rawFloor}". Defaulting to ${DEFAULT_FLOOR_DATE}.`);
    floorDate = new Date(`${DEFAULT_FLOOR_DATE}T00:00:00Z`);
  }
  return { kind, floorDate };
}

/**
 * Output format follows the output file extension unless set explicitly
 */
function readOutputFormat(env: Env, outputPath: string): OutputFormat {
  const inferred: OutputFormat = extname(outputPath).toLowerCase() === '.csv' ? 'csv' : 'xlsx';
  return readChoice(env, 'CANDLES_OUTPUT_FORMAT', ['xlsx', 'csv'] as const, inferred);
}

/**
 * Build the run configuration from an environment map.
 *
 * @param env Defaults to process.env
 */
export function loadFetchConfig(env: Env = process.env): FetchConfig {
  const outputPath = readString(env, 'CANDLES_OUTPUT_PATH', DEFAULT_OUTPUT_PATH);
  const accessToken = env.UPSTOX_ACCESS_TOKEN?.trim();

  const config: FetchConfig = {
    inputPath: readString(env, 'CANDLES_INPUT_PATH', DEFAULT_INPUT_PATH),
    outputPath,
    outputFormat: readOutputFormat(env, outputPath),
    symbolColumn: readString(env, 'CANDLES_SYMBOL_COLUMN', 'symbol').toLowerCase(),
    identifierColumn: readString(env, 'CANDLES_IDENTIFIER_COLUMN', 'isin_number').toLowerCase(),
    exchangePrefix: readString(env, 'CANDLES_EXCHANGE_PREFIX', DEFAULT_EXCHANGE_PREFIX),
    intervalUnit: readChoice(env, 'CANDLES_INTERVAL_UNIT', INTERVAL_UNITS, 'days'),
    intervalValue: String(readInt(env, 'CANDLES_INTERVAL_VALUE', 1, 1)),
    workerCount: readInt(env, 'CANDLES_WORKERS', DEFAULT_WORKERS, 1),
    chunkSpanDays: readInt(env, 'CANDLES_CHUNK_DAYS', DEFAULT_CHUNK_DAYS, 1),
    pacingDelayMs: readInt(env, 'CANDLES_PACING_MS', DEFAULT_PACING_MS, 0),
    requestTimeoutMs: readInt(env, 'CANDLES_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS, 1),
    horizon: Object.freeze(readHorizon(env)),
    onFetchError: readChoice(env, 'CANDLES_ON_FETCH_ERROR', ['empty', 'fail'] as const, 'empty'),
    apiBaseUrl: readString(env, 'UPSTOX_API_BASE_URL', DEFAULT_API_BASE_URL).replace(/\/+$/, ''),
    accessToken: accessToken ? accessToken : undefined,
  };

  return Object.freeze(config);
}

/**
 * One-line description of the history horizon for log output
 */
export function describeHorizon(horizon: HistoryHorizon): string {
  if (horizon.kind === 'adaptive') {
    return `adaptive back to ${horizon.stopYear} (stop on empty window before ${horizon.guardYear})`;
  }
  return `fixed back to ${horizon.floorDate.toISOString().slice(0, 10)}`;
}
