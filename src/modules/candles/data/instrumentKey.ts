/**
 * Instrument key resolution
 *
 * The provider addresses instruments as "<EXCHANGE_SEGMENT>|<ISIN>",
 * e.g. NSE_EQ|INE002A01018.
 */

export function resolveInstrumentKey(identifier: string, exchangePrefix: string): string {
  return `${exchangePrefix}${identifier.trim()}`;
}
