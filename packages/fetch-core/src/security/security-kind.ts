import type { SecurityKind } from '@quarry/schemas';

/**
 * Index symbols recognized without a declared kind
 */
export const KNOWN_INDEX_SYMBOLS: ReadonlySet<string> = new Set([
  'NDX',
  'SPX',
  'RUT',
  'VIX',
  'DJI',
  'IXIC',
  'COMPX',
]);

// Plain listed ticker, optionally with a share-class suffix (BRK.B, BF-B)
const TICKER_PATTERN = /^[A-Z][A-Z0-9]{0,5}([.-][A-Z0-9]{1,2})?$/;

/**
 * Resolve the security kind once per symbol, before any request is planned.
 * A declared kind wins; anything that is neither a known index nor a plain
 * ticker is 'unknown' and fails the symbol.
 */
export function resolveSecurityKind(symbol: string, declared?: SecurityKind): SecurityKind {
  if (declared && declared !== 'unknown') return declared;
  if (KNOWN_INDEX_SYMBOLS.has(symbol)) return 'index';
  if (TICKER_PATTERN.test(symbol)) return 'equity';
  return 'unknown';
}
