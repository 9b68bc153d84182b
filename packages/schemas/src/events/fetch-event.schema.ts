import type { BarSize, SecurityKind } from '../market/bar.schema';
import type { FailureReason, ReconciliationWarning } from '../report/series.schema';

export type ChunkOutcome = 'succeeded' | 'transient-failure' | 'terminal-failure';

/**
 * Structured events emitted by the fetch core.
 * Formatting and storage belong to the sink.
 */
export type FetchEvent =
  | {
      type: 'batch-started';
      total: number;
      skipped: number;
      startDate: string;
      endDate: string;
      barSize: BarSize;
    }
  | {
      type: 'fetch-started';
      symbol: string;
      startDate: string;
      endDate: string;
      kind: SecurityKind;
      chunkCount: number;
    }
  | {
      type: 'chunk-result';
      symbol: string;
      chunkIndex: number;
      attempt: number;
      outcome: ChunkOutcome;
      barCount?: number;
      reason?: string;
    }
  | {
      type: 'chunk-retry';
      symbol: string;
      chunkIndex: number;
      attempt: number;
      delayMs: number;
      reason: string;
    }
  | {
      type: 'series-reconciled';
      symbol: string;
      barCount: number;
      /** Bars the provider returned outside the requested range */
      droppedOutOfRange: number;
    }
  | {
      type: 'reconciliation-warning';
      symbol: string;
      warnings: ReconciliationWarning[];
    }
  | {
      type: 'symbol-result';
      symbol: string;
      outcome: 'success' | 'failure';
      recordCount: number;
      elapsedMs: number;
      reason?: FailureReason;
    }
  | {
      type: 'batch-progress';
      completed: number;
      total: number;
      symbol: string;
    }
  | {
      type: 'batch-summary';
      total: number;
      success: number;
      failed: number;
      elapsedMs: number;
    };

export type FetchEventType = FetchEvent['type'];

/**
 * Receiver of fetch events. Implementations must not throw.
 */
export interface FetchEventSink {
  emit(event: FetchEvent): void;
}
