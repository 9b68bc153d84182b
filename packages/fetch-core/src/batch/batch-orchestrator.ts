import {
  DEFAULT_BAR_SIZE,
  type BarSize,
  type BatchReport,
  type CalendarDate,
  type DateRange,
  type FetchEventSink,
  type IProviderSession,
  type SecurityKind,
  type SeriesResult,
  type SymbolOutcome,
} from '@quarry/schemas';
import { getMaxWindowDays, todayCalendarDate } from '@quarry/utils';
import { systemClock, type Clock } from '../clock';
import { Throttle, DEFAULT_REQUEST_SPACING_MS } from '../throttle/throttle';
import { LinearRetryPolicy, type RetryPolicy } from '../retry/retry-policy';
import { SymbolFetcher } from '../fetcher/symbol-fetcher';
import type { TransitionObserver } from '../fetcher/fetch-state';
import type { OutputSink } from '../output/output-sink';
import { withSession } from '../session/with-session';
import { cleanSymbolList, selectSymbols } from './symbol-list';
import { BatchReportBuilder, failureOutcome, successOutcome } from './batch-report';

export interface BatchOrchestratorOptions {
  /** Not yet connected; the orchestrator owns it for the run */
  session: IProviderSession;
  sink: OutputSink;
  events: FetchEventSink;
  clock?: Clock;
  /** Start-to-start spacing of provider requests (default: 3000) */
  requestSpacingMs?: number;
  retryPolicy?: RetryPolicy;
  /** Overrides the bar-size based request window */
  maxWindowDays?: number;
  onTransition?: TransitionObserver;
}

export interface BatchRequest {
  /** Raw symbol strings; cleaned before fetching */
  symbols: readonly string[];
  startDate: CalendarDate;
  /** Fixed for the whole run (default: today at run start) */
  endDate?: CalendarDate;
  outputDir: string;
  /** When false nothing is written and each success carries its bars */
  persist: boolean;
  barSize?: BarSize;
  /** Applies to every symbol of the batch (e.g. an index list) */
  declaredKind?: SecurityKind;
  /** 1-based position in the cleaned list to start from */
  startFrom?: number;
  maxCount?: number;
  /** Checked between symbols and between chunks */
  signal?: AbortSignal;
}

/**
 * Runs a batch of symbols against one provider session
 *
 * - the session is connected once; a ConnectionError propagates before any
 *   symbol is attempted, and the session is always released afterwards
 * - symbols run strictly one after another through one shared Throttle
 * - a symbol's failure is recorded and the batch moves on
 * - each success is handed to the OutputSink before the next symbol starts
 */
export class BatchOrchestrator {
  private session: IProviderSession;
  private sink: OutputSink;
  private events: FetchEventSink;
  private clock: Clock;
  private requestSpacingMs: number;
  private retryPolicy: RetryPolicy;
  private maxWindowDays?: number;
  private onTransition?: TransitionObserver;

  constructor(options: BatchOrchestratorOptions) {
    this.session = options.session;
    this.sink = options.sink;
    this.events = options.events;
    this.clock = options.clock ?? systemClock;
    this.requestSpacingMs = options.requestSpacingMs ?? DEFAULT_REQUEST_SPACING_MS;
    this.retryPolicy = options.retryPolicy ?? new LinearRetryPolicy();
    this.maxWindowDays = options.maxWindowDays;
    this.onTransition = options.onTransition;
  }

  /**
   * @throws ConnectionError when the session cannot be established
   * @throws RangeError when the start date is after the end date
   */
  async run(request: BatchRequest): Promise<BatchReport> {
    const startedAt = this.clock.now();
    const barSize = request.barSize ?? DEFAULT_BAR_SIZE;
    const range: DateRange = {
      start: request.startDate,
      end: request.endDate ?? todayCalendarDate(new Date(startedAt)),
    };
    if (range.start > range.end) {
      throw new RangeError(`Start date ${range.start} is after end date ${range.end}`);
    }

    const { symbols, skipped } = selectSymbols(cleanSymbolList(request.symbols), request);
    const report = new BatchReportBuilder({
      startDate: range.start,
      endDate: range.end,
      barSize,
      skipped,
    });

    this.events.emit({
      type: 'batch-started',
      total: symbols.length,
      skipped: skipped.length,
      startDate: range.start,
      endDate: range.end,
      barSize,
    });

    if (symbols.length > 0) {
      await withSession(this.session, async (session) => {
        const fetcher = new SymbolFetcher({
          session,
          throttle: new Throttle({ minSpacingMs: this.requestSpacingMs, clock: this.clock }),
          retryPolicy: this.retryPolicy,
          events: this.events,
          clock: this.clock,
          maxWindowDays: this.maxWindowDays ?? getMaxWindowDays(barSize),
          signal: request.signal,
          onTransition: this.onTransition,
        });

        for (const symbol of symbols) {
          const outcome = request.signal?.aborted
            ? failureOutcome('cancelled', 0)
            : await this.processSymbol(fetcher, symbol, range, request);

          report.record(symbol, outcome);
          this.emitSymbolResult(symbol, outcome);
          this.events.emit({
            type: 'batch-progress',
            completed: report.completed,
            total: symbols.length,
            symbol,
          });
        }
      });
    }

    const result = report.build(this.clock.now() - startedAt);
    this.events.emit({
      type: 'batch-summary',
      total: result.total,
      success: result.succeeded,
      failed: result.failed,
      elapsedMs: result.elapsedMs,
    });
    return result;
  }

  private async processSymbol(
    fetcher: SymbolFetcher,
    symbol: string,
    range: DateRange,
    request: BatchRequest
  ): Promise<SymbolOutcome> {
    const startedAt = this.clock.now();

    let series: SeriesResult;
    try {
      series = await fetcher.fetch(symbol, range, request.declaredKind);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return failureOutcome('provider error', this.clock.now() - startedAt, message);
    }

    if (series.status === 'failed') {
      return failureOutcome(series.reason, series.elapsedMs, series.detail);
    }

    if (!request.persist) {
      return successOutcome(series, { bars: series.bars });
    }

    try {
      const written = await this.sink.write(symbol, series.bars, request.outputDir);
      return successOutcome(series, { outputPath: written.path });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return failureOutcome('output error', this.clock.now() - startedAt, message);
    }
  }

  private emitSymbolResult(symbol: string, outcome: SymbolOutcome): void {
    if (outcome.status === 'success') {
      this.events.emit({
        type: 'symbol-result',
        symbol,
        outcome: 'success',
        recordCount: outcome.recordCount,
        elapsedMs: outcome.elapsedMs,
      });
    } else {
      this.events.emit({
        type: 'symbol-result',
        symbol,
        outcome: 'failure',
        recordCount: 0,
        elapsedMs: outcome.elapsedMs,
        reason: outcome.reason,
      });
    }
  }
}
