/**
 * Data provider abstraction
 *
 * Builds a fresh historical-candle client from the run configuration.
 * Called once per pipeline so concurrent pipelines never share a client.
 */

import type { FetchConfig } from '../../config';
import type { HistoricalCandleClient } from '../../types';
import { UpstoxHistoryClient } from './upstox';

export type CandleClientFactory = (config: FetchConfig) => HistoricalCandleClient;

export const createCandleClient: CandleClientFactory = (config) =>
  new UpstoxHistoryClient({
    baseUrl: config.apiBaseUrl,
    intervalUnit: config.intervalUnit,
    intervalValue: config.intervalValue,
    timeoutMs: config.requestTimeoutMs,
    accessToken: config.accessToken,
  });

export { UpstoxHistoryClient, buildHistoricalCandleUrl, extractCandles, toApiDate } from './upstox';
