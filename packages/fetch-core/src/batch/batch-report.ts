import type {
  Bar,
  BarSize,
  BatchReport,
  CalendarDate,
  FailureReason,
  SeriesResult,
  SkippedEntry,
  SymbolOutcome,
} from '@quarry/schemas';

type ReconciledSeries = Extract<SeriesResult, { status: 'reconciled' }>;

/**
 * Percent change from the first to the last close
 */
export function totalReturnPct(bars: readonly Bar[]): number {
  if (bars.length === 0) return 0;
  const first = bars[0].close;
  const last = bars[bars.length - 1].close;
  return ((last - first) / first) * 100;
}

export function successOutcome(
  series: ReconciledSeries,
  persisted: { outputPath: string } | { bars: Bar[] }
): SymbolOutcome {
  const { bars } = series;
  return {
    status: 'success',
    recordCount: bars.length,
    firstDate: bars[0].date,
    lastDate: bars[bars.length - 1].date,
    totalReturnPct: totalReturnPct(bars),
    dataQualityWarning: series.warnings.length > 0,
    elapsedMs: series.elapsedMs,
    ...persisted,
  };
}

export function failureOutcome(reason: FailureReason, elapsedMs: number, detail?: string): SymbolOutcome {
  return detail === undefined
    ? { status: 'failure', reason, elapsedMs }
    : { status: 'failure', reason, detail, elapsedMs };
}

export interface BatchReportHeader {
  startDate: CalendarDate;
  endDate: CalendarDate;
  barSize: BarSize;
  skipped: readonly SkippedEntry[];
}

/**
 * Accumulates one outcome per symbol while the batch runs
 */
export class BatchReportBuilder {
  private outcomes = new Map<string, SymbolOutcome>();
  private header: BatchReportHeader;

  constructor(header: BatchReportHeader) {
    this.header = header;
  }

  /**
   * @throws Error if the symbol already has an outcome
   */
  record(symbol: string, outcome: SymbolOutcome): void {
    if (this.outcomes.has(symbol)) {
      throw new Error(`Outcome for ${symbol} already recorded`);
    }
    this.outcomes.set(symbol, outcome);
  }

  get completed(): number {
    return this.outcomes.size;
  }

  /**
   * Freeze the accumulated outcomes into the final report
   */
  build(elapsedMs: number): BatchReport {
    const outcomes: ReadonlyMap<string, SymbolOutcome> = new Map(this.outcomes);
    let succeeded = 0;
    for (const outcome of outcomes.values()) {
      if (outcome.status === 'success') succeeded++;
    }

    return Object.freeze({
      outcomes,
      skipped: Object.freeze([...this.header.skipped]),
      total: outcomes.size,
      succeeded,
      failed: outcomes.size - succeeded,
      elapsedMs,
      startDate: this.header.startDate,
      endDate: this.header.endDate,
      barSize: this.header.barSize,
    });
  }
}
