import type { Bar, DateRange, ReconciliationWarning } from '@quarry/schemas';

/**
 * Bars returned by one chunk request
 */
export interface ChunkBars {
  chunkIndex: number;
  bars: readonly Bar[];
  /** The response hit the provider's per-response cap */
  truncated?: boolean;
}

export interface ReconciledSeries {
  /** Ascending by date, one bar per date */
  bars: Bar[];
  warnings: ReconciliationWarning[];
  /** Bars the provider returned outside the requested range */
  droppedOutOfRange: number;
}

function compareDates(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Merge per-chunk responses into one series
 *
 * - bars dated outside the parent range are dropped (the provider may answer
 *   with a wider period than asked)
 * - on a duplicate date the bar from the later chunk wins; within one chunk
 *   the later row wins
 * - the result is sorted ascending
 *
 * Duplicates, descending input and truncated responses are reported as
 * warnings; none of them fail the series.
 */
export function reconcileChunks(range: DateRange, chunks: readonly ChunkBars[]): ReconciledSeries {
  const warnings: ReconciliationWarning[] = [];
  const byDate = new Map<string, Bar>();
  let droppedOutOfRange = 0;

  const ordered = [...chunks].sort((a, b) => a.chunkIndex - b.chunkIndex);

  for (const { chunkIndex, bars, truncated } of ordered) {
    if (truncated) {
      warnings.push({ kind: 'truncated-response', date: bars[0]?.date ?? range.start, chunkIndex });
    }

    let previousDate: string | null = null;

    for (const bar of bars) {
      const day = bar.date.slice(0, 10);
      if (day < range.start || day > range.end) {
        droppedOutOfRange++;
        continue;
      }

      if (previousDate !== null && bar.date < previousDate) {
        warnings.push({ kind: 'out-of-order', date: bar.date, chunkIndex });
      }
      previousDate = bar.date;

      if (byDate.has(bar.date)) {
        warnings.push({ kind: 'duplicate-date', date: bar.date, chunkIndex });
      }
      byDate.set(bar.date, bar);
    }
  }

  return {
    bars: [...byDate.values()].sort((a, b) => compareDates(a.date, b.date)),
    warnings,
    droppedOutOfRange,
  };
}
