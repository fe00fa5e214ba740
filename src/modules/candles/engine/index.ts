/**
 * Candle engine exports
 */

export { paginateHistory, planWindow, nextWindowEnd, startOfUtcDay, addUtcDays } from './paginate';
export type { PaginationOptions, PaginationResult } from './paginate';
export { normalizeCandles, sortAndDedupe, toCandle, toNaiveTimestamp, toLongRows } from './normalize';
export { fanOutRoster, fetchSymbolHistory } from './fanOut';
export type { FanOutDeps } from './fanOut';
export { aggregateResults, sanitizeSheetName, assignSheetNames, sortLongRows } from './aggregate';
