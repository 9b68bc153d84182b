import {
  ProviderUnavailableError,
  type Bar,
  type BarsResponse,
  type Chunk,
  type DateRange,
  type FailureReason,
  type FetchEventSink,
  type IProviderSession,
  type ProviderError,
  type SecurityKind,
  type SeriesResult,
} from '@quarry/schemas';
import type { Clock } from '../clock';
import type { Throttle } from '../throttle/throttle';
import type { RetryPolicy } from '../retry/retry-policy';
import { planChunks } from '../planning/chunk-planner';
import { reconcileChunks, type ChunkBars } from '../reconciliation/reconcile-bars';
import { resolveSecurityKind } from '../security/security-kind';
import { FetchStateMachine, type TransitionObserver } from './fetch-state';

export interface SymbolFetcherOptions {
  /** Connected session shared by the whole batch */
  session: IProviderSession;
  /** Shared pacing gate */
  throttle: Throttle;
  retryPolicy: RetryPolicy;
  events: FetchEventSink;
  clock: Clock;
  /** Widest calendar window of a single request */
  maxWindowDays: number;
  /** Checked between chunks and before each retry; an in-flight request is never interrupted */
  signal?: AbortSignal;
  onTransition?: TransitionObserver;
}

type ChunkOutcome =
  | { status: 'succeeded'; bars: Bar[]; truncated: boolean }
  | { status: 'failed'; error: ProviderError; attempts: number }
  | { status: 'cancelled' };

/**
 * Drives one symbol from planning to a reconciled series or a definitive failure
 *
 * Chunks are requested strictly oldest-first. Transient chunk failures are
 * retried here per the RetryPolicy and never escape; the first chunk that gives
 * up fails the whole symbol. Retry counts and delays are visible as
 * chunk-retry events.
 */
export class SymbolFetcher {
  private options: SymbolFetcherOptions;

  constructor(options: SymbolFetcherOptions) {
    this.options = options;
  }

  async fetch(symbol: string, range: DateRange, declaredKind?: SecurityKind): Promise<SeriesResult> {
    const { events, clock, signal } = this.options;
    const startedAt = clock.now();
    const machine = new FetchStateMachine(symbol, this.options.onTransition);

    const fail = (reason: FailureReason, detail?: string): SeriesResult => {
      machine.transition('failed');
      return { status: 'failed', symbol, reason, detail, elapsedMs: clock.now() - startedAt };
    };

    const kind = resolveSecurityKind(symbol, declaredKind);
    if (kind === 'unknown') {
      return fail('unknown security kind', `Cannot tell whether ${symbol} is an equity or an index`);
    }

    const plan = planChunks(range, this.options.maxWindowDays);
    events.emit({
      type: 'fetch-started',
      symbol,
      startDate: range.start,
      endDate: range.end,
      kind,
      chunkCount: plan.count,
    });

    const collected: ChunkBars[] = [];
    for (const chunk of plan) {
      if (signal?.aborted) {
        return fail('cancelled');
      }

      const outcome = await this.fetchChunk(machine, symbol, chunk, kind);
      if (outcome.status === 'cancelled') {
        return fail('cancelled', `Cancelled while retrying chunk ${chunk.index}`);
      }
      if (outcome.status === 'failed') {
        const attempts = outcome.attempts === 1 ? '1 attempt' : `${outcome.attempts} attempts`;
        return fail(
          outcome.error.reason,
          `Chunk ${chunk.index} (${chunk.start}..${chunk.end}) failed after ${attempts}: ${outcome.error.message}`
        );
      }
      collected.push({ chunkIndex: chunk.index, bars: outcome.bars, truncated: outcome.truncated });
    }

    const reconciled = reconcileChunks(range, collected);
    events.emit({
      type: 'series-reconciled',
      symbol,
      barCount: reconciled.bars.length,
      droppedOutOfRange: reconciled.droppedOutOfRange,
    });
    if (reconciled.bars.length === 0) {
      return fail('no data', `Provider returned no bars for ${range.start}..${range.end}`);
    }

    if (reconciled.warnings.length > 0) {
      events.emit({ type: 'reconciliation-warning', symbol, warnings: reconciled.warnings });
    }

    machine.transition('reconciled');
    return {
      status: 'reconciled',
      symbol,
      bars: reconciled.bars,
      warnings: reconciled.warnings,
      elapsedMs: clock.now() - startedAt,
    };
  }

  private async fetchChunk(
    machine: FetchStateMachine,
    symbol: string,
    chunk: Chunk,
    kind: SecurityKind
  ): Promise<ChunkOutcome> {
    const { session, throttle, retryPolicy, events, clock, signal } = this.options;

    for (let attempt = 1; ; attempt++) {
      machine.transition('fetching-chunk', chunk.index);
      await throttle.acquire();
      const response = await this.request(session, symbol, chunk, kind);

      if (response.ok) {
        machine.transition('chunk-succeeded', chunk.index);
        events.emit({
          type: 'chunk-result',
          symbol,
          chunkIndex: chunk.index,
          attempt,
          outcome: 'succeeded',
          barCount: response.bars.length,
        });
        return { status: 'succeeded', bars: response.bars, truncated: response.truncated ?? false };
      }

      const { error } = response;
      machine.transition('chunk-failed', chunk.index);
      events.emit({
        type: 'chunk-result',
        symbol,
        chunkIndex: chunk.index,
        attempt,
        outcome: error.isTransient ? 'transient-failure' : 'terminal-failure',
        reason: error.reason,
      });

      const decision = retryPolicy.decide(attempt, error.classification);
      if (decision.action === 'give-up') {
        return { status: 'failed', error, attempts: attempt };
      }
      if (signal?.aborted) {
        return { status: 'cancelled' };
      }

      machine.transition('retrying', chunk.index);
      events.emit({
        type: 'chunk-retry',
        symbol,
        chunkIndex: chunk.index,
        attempt,
        delayMs: decision.delayMs,
        reason: error.reason,
      });
      await clock.sleep(decision.delayMs);
      if (signal?.aborted) {
        return { status: 'cancelled' };
      }
    }
  }

  /**
   * Sessions resolve instead of throwing; anything thrown anyway counts as a
   * transient provider error so it goes through the retry budget.
   */
  private async request(
    session: IProviderSession,
    symbol: string,
    chunk: Chunk,
    kind: SecurityKind
  ): Promise<BarsResponse> {
    try {
      return await session.requestBars(symbol, chunk, kind);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, error: new ProviderUnavailableError(message, { cause: error }) };
    }
  }
}
