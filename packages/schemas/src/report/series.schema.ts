import type { Bar, BarSize, CalendarDate } from '../market/bar.schema';
import type { ProviderFailureReason } from '../provider/errors';

/**
 * Data-quality finding raised while merging chunk responses.
 * Recorded on the result; never fails the symbol.
 */
export interface ReconciliationWarning {
  kind: 'duplicate-date' | 'out-of-order' | 'truncated-response';
  date: string;
  chunkIndex: number;
}

/**
 * Fixed failure phrases that appear in the batch report
 */
export type FailureReason =
  | ProviderFailureReason
  | 'no data'
  | 'unknown security kind'
  | 'cancelled'
  | 'output error';

/**
 * Per-symbol fetch result owned by the SymbolFetcher.
 * Success always carries at least one bar.
 */
export type SeriesResult =
  | {
      status: 'reconciled';
      symbol: string;
      bars: Bar[];
      warnings: ReconciliationWarning[];
      elapsedMs: number;
    }
  | {
      status: 'failed';
      symbol: string;
      reason: FailureReason;
      detail?: string;
      elapsedMs: number;
    };

export type SymbolOutcome =
  | {
      status: 'success';
      recordCount: number;
      firstDate: string;
      lastDate: string;
      /** Percent change from first to last close */
      totalReturnPct: number;
      /** True when reconciliation recorded warnings */
      dataQualityWarning: boolean;
      elapsedMs: number;
      outputPath?: string;
      /** Present only when the batch ran without persistence */
      bars?: Bar[];
    }
  | {
      status: 'failure';
      reason: FailureReason;
      detail?: string;
      elapsedMs: number;
    };

export type SkipReason = 'blank' | 'delisted' | 'duplicate' | 'not selected';

export interface SkippedEntry {
  /** Input entry as given */
  raw: string;
  reason: SkipReason;
}

/**
 * Immutable record of a completed batch run
 */
export interface BatchReport {
  readonly outcomes: ReadonlyMap<string, SymbolOutcome>;
  readonly skipped: readonly SkippedEntry[];
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly elapsedMs: number;
  readonly startDate: CalendarDate;
  readonly endDate: CalendarDate;
  readonly barSize: BarSize;
}
