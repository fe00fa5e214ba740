/**
 * Candle data layer exports
 */

export { loadRoster, parseRoster } from './roster';
export type { RosterColumns } from './roster';
export { resolveInstrumentKey } from './instrumentKey';
export { createCandleClient, UpstoxHistoryClient } from './providers';
export type { CandleClientFactory } from './providers';
