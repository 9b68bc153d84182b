import type { SkippedEntry } from '@quarry/schemas';

export interface CleanedSymbolList {
  /** Normalized symbols in first-occurrence order */
  symbols: string[];
  /** Input entries dropped before fetching, in input order */
  skipped: SkippedEntry[];
}

/**
 * A symbol wrapped in '$' (e.g. $TWTR$) marks a delisted security
 */
export function isDelistedMarker(symbol: string): boolean {
  return symbol.length >= 2 && symbol.startsWith('$') && symbol.endsWith('$');
}

/**
 * Normalize a raw symbol list: trim, uppercase and strip a stray '$', drop
 * blank and delisting-marked entries, keep the first occurrence of each symbol.
 */
export function cleanSymbolList(raw: readonly string[]): CleanedSymbolList {
  const symbols: string[] = [];
  const skipped: SkippedEntry[] = [];
  const seen = new Set<string>();

  for (const entry of raw) {
    const trimmed = entry.trim().toUpperCase();
    if (isDelistedMarker(trimmed)) {
      skipped.push({ raw: entry, reason: 'delisted' });
      continue;
    }

    const symbol = trimmed.replace(/^\$+|\$+$/g, '');
    if (symbol === '') {
      skipped.push({ raw: entry, reason: 'blank' });
    } else if (seen.has(symbol)) {
      skipped.push({ raw: entry, reason: 'duplicate' });
    } else {
      seen.add(symbol);
      symbols.push(symbol);
    }
  }

  return { symbols, skipped };
}

export interface SymbolSlice {
  /** 1-based position of the first symbol to keep */
  startFrom?: number;
  /** Keep at most this many symbols */
  maxCount?: number;
}

/**
 * Select a window of a cleaned list: skip to `startFrom`, then take `maxCount`
 */
export function sliceSymbols(symbols: readonly string[], slice: SymbolSlice = {}): string[] {
  const from = Math.max((slice.startFrom ?? 1) - 1, 0);
  const selected = symbols.slice(from);
  return slice.maxCount === undefined ? selected : selected.slice(0, slice.maxCount);
}

/**
 * Apply a slice to a cleaned list; symbols left out are recorded as 'not selected'
 */
export function selectSymbols(cleaned: CleanedSymbolList, slice: SymbolSlice = {}): CleanedSymbolList {
  const symbols = sliceSymbols(cleaned.symbols, slice);
  const kept = new Set(symbols);
  const excluded = cleaned.symbols
    .filter((symbol) => !kept.has(symbol))
    .map((symbol): SkippedEntry => ({ raw: symbol, reason: 'not selected' }));
  return { symbols, skipped: [...cleaned.skipped, ...excluded] };
}
