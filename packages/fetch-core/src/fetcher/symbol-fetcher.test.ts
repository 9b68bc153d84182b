import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  EntitlementDeniedError,
  RequestTimeoutError,
  UnresolvableSecurityError,
  type DateRange,
  type SeriesResult,
} from '@quarry/schemas';
import { SymbolFetcher, type SymbolFetcherOptions } from './symbol-fetcher';
import type { FetchTransition } from './fetch-state';
import { Throttle } from '../throttle/throttle';
import { LinearRetryPolicy } from '../retry/retry-policy';
import { createCollectingEventSink, type CollectingEventSink } from '../events/event-sinks';
import { FakeClock, FakeProviderSession, dailyBars, makeBar } from '../__tests__/fakes';

const RANGE: DateRange = { start: '2020-01-01', end: '2020-01-10' };

function expectReconciled(result: SeriesResult) {
  if (result.status !== 'reconciled') {
    throw new Error(`Expected reconciled, got ${result.status}: ${result.reason}`);
  }
  return result;
}

function expectFailed(result: SeriesResult) {
  if (result.status !== 'failed') {
    throw new Error('Expected failed result');
  }
  return result;
}

describe('SymbolFetcher', () => {
  let clock: FakeClock;
  let session: FakeProviderSession;
  let events: CollectingEventSink;

  function createFetcher(overrides: Partial<SymbolFetcherOptions> = {}): SymbolFetcher {
    return new SymbolFetcher({
      session,
      throttle: new Throttle({ minSpacingMs: 3000, clock }),
      retryPolicy: new LinearRetryPolicy(),
      events,
      clock,
      maxWindowDays: 365,
      ...overrides,
    });
  }

  beforeEach(async () => {
    clock = new FakeClock(0);
    session = new FakeProviderSession(clock);
    events = createCollectingEventSink();
    await session.connect();
  });

  it('should return the bars of a single-chunk symbol', async () => {
    session.on('AAPL', (chunk) => ({ ok: true, bars: dailyBars(chunk.start, chunk.end) }));

    const result = expectReconciled(await createFetcher().fetch('AAPL', RANGE));

    expect(result.bars).toEqual(dailyBars('2020-01-01', '2020-01-10'));
    expect(result.warnings).toEqual([]);
    expect(events.ofType('fetch-started')).toEqual([
      {
        type: 'fetch-started',
        symbol: 'AAPL',
        startDate: '2020-01-01',
        endDate: '2020-01-10',
        kind: 'equity',
        chunkCount: 1,
      },
    ]);
  });

  it('should request chunks oldest-first through the throttle', async () => {
    session.on('AAPL', (chunk) => ({ ok: true, bars: dailyBars(chunk.start, chunk.end) }));

    const result = expectReconciled(await createFetcher({ maxWindowDays: 4 }).fetch('AAPL', RANGE));

    expect(session.requests.map((r) => [r.chunk.start, r.chunk.end])).toEqual([
      ['2020-01-01', '2020-01-04'],
      ['2020-01-05', '2020-01-08'],
      ['2020-01-09', '2020-01-10'],
    ]);
    expect(session.requests.map((r) => r.at)).toEqual([0, 3000, 6000]);
    expect(result.bars).toHaveLength(10);
    expect(events.ofType('chunk-result').map((e) => e.barCount)).toEqual([4, 4, 2]);
  });

  it('should keep only bars of the successful attempt after two timeouts', async () => {
    const good = [makeBar('2020-01-02', 101), makeBar('2020-01-03', 102)];
    session.on('AAPL', (_chunk, attempt) =>
      attempt <= 2 ? { ok: false, error: new RequestTimeoutError(45_000) } : { ok: true, bars: good }
    );

    const result = expectReconciled(await createFetcher().fetch('AAPL', RANGE));

    expect(result.bars).toEqual(good);
    const retries = events.ofType('chunk-retry');
    expect(retries).toHaveLength(2);
    expect(retries.map((e) => [e.chunkIndex, e.attempt, e.delayMs, e.reason])).toEqual([
      [0, 1, 3000, 'request timeout'],
      [0, 2, 6000, 'request timeout'],
    ]);
    expect(clock.sleeps).toEqual([3000, 6000]);
    expect(events.ofType('chunk-result').map((e) => e.outcome)).toEqual([
      'transient-failure',
      'transient-failure',
      'succeeded',
    ]);
  });

  it('should give up after the retry budget is spent', async () => {
    session.on('AAPL', () => ({ ok: false, error: new RequestTimeoutError(45_000) }));

    const result = expectFailed(await createFetcher().fetch('AAPL', RANGE));

    expect(result.reason).toBe('request timeout');
    expect(result.detail).toBe(
      'Chunk 0 (2020-01-01..2020-01-10) failed after 3 attempts: Request timed out after 45000ms'
    );
    expect(session.requests).toHaveLength(3);
  });

  it('should not retry terminal errors', async () => {
    session.on('BADSYM', () => ({ ok: false, error: new UnresolvableSecurityError('No STK contract') }));

    const result = expectFailed(await createFetcher().fetch('BADSYM', RANGE));

    expect(result.reason).toBe('unresolvable security');
    expect(session.requests).toHaveLength(1);
    expect(events.ofType('chunk-retry')).toEqual([]);
    expect(events.ofType('chunk-result')[0].outcome).toBe('terminal-failure');
  });

  it('should fail the whole symbol when a later chunk fails', async () => {
    session.on('AAPL', (chunk) =>
      chunk.index === 0
        ? { ok: true, bars: dailyBars(chunk.start, chunk.end) }
        : { ok: false, error: new EntitlementDeniedError('No market data permissions') }
    );

    const result = expectFailed(await createFetcher({ maxWindowDays: 5 }).fetch('AAPL', RANGE));

    expect(result.reason).toBe('entitlement denied');
  });

  it('should report a symbol without bars as "no data"', async () => {
    session.on('AAPL', () => ({ ok: true, bars: [] }));

    const result = expectFailed(await createFetcher({ maxWindowDays: 4 }).fetch('AAPL', RANGE));

    expect(result.reason).toBe('no data');
    expect(session.requests).toHaveLength(3);
  });

  it('should report "no data" when every bar falls outside the range', async () => {
    session.on('AAPL', () => ({ ok: true, bars: [makeBar('2019-12-31', 100)] }));

    const result = expectFailed(await createFetcher().fetch('AAPL', RANGE));

    expect(result.reason).toBe('no data');
  });

  it('should fail symbols of unknown kind without a request', async () => {
    const result = expectFailed(await createFetcher().fetch('BRK/B', RANGE));

    expect(result.reason).toBe('unknown security kind');
    expect(session.requests).toEqual([]);
  });

  it('should pass the resolved kind to the session', async () => {
    session.on('NDX', (chunk) => ({ ok: true, bars: dailyBars(chunk.start, chunk.end) }));
    session.on('OEX', (chunk) => ({ ok: true, bars: dailyBars(chunk.start, chunk.end) }));

    await createFetcher().fetch('NDX', RANGE);
    await createFetcher().fetch('OEX', RANGE, 'index');

    expect(session.requests.map((r) => [r.symbol, r.kind])).toEqual([
      ['NDX', 'index'],
      ['OEX', 'index'],
    ]);
  });

  it('should stop between chunks once cancelled', async () => {
    const controller = new AbortController();
    session.on('AAPL', (chunk) => {
      controller.abort();
      return { ok: true, bars: dailyBars(chunk.start, chunk.end) };
    });

    const result = expectFailed(
      await createFetcher({ maxWindowDays: 4, signal: controller.signal }).fetch('AAPL', RANGE)
    );

    expect(result.reason).toBe('cancelled');
    expect(session.requests).toHaveLength(1);
  });

  it('should not retry a failed chunk once cancelled', async () => {
    const controller = new AbortController();
    session.on('AAPL', (chunk, attempt) => {
      if (attempt === 1) {
        controller.abort();
        return { ok: false, error: new RequestTimeoutError(45_000) };
      }
      return { ok: true, bars: dailyBars(chunk.start, chunk.end) };
    });

    const result = expectFailed(
      await createFetcher({ signal: controller.signal }).fetch('AAPL', RANGE)
    );

    expect(result.reason).toBe('cancelled');
    expect(session.requests).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
    expect(events.ofType('chunk-retry')).toEqual([]);
  });

  it('should stop after the backoff when cancelled while waiting', async () => {
    const controller = new AbortController();
    session.on('AAPL', (chunk, attempt) => {
      if (attempt === 1) return { ok: false, error: new RequestTimeoutError(45_000) };
      return { ok: true, bars: dailyBars(chunk.start, chunk.end) };
    });
    const sleep = clock.sleep.bind(clock);
    vi.spyOn(clock, 'sleep').mockImplementation(async (ms: number) => {
      await sleep(ms);
      controller.abort();
    });

    const result = expectFailed(
      await createFetcher({ signal: controller.signal }).fetch('AAPL', RANGE)
    );

    expect(result.reason).toBe('cancelled');
    expect(session.requests).toHaveLength(1);
    expect(clock.sleeps).toEqual([3000]);
  });

  it('should retry when the session throws instead of resolving', async () => {
    session.on('AAPL', (chunk, attempt) => {
      if (attempt === 1) throw new Error('socket hang up');
      return { ok: true, bars: dailyBars(chunk.start, chunk.end) };
    });

    const result = expectReconciled(await createFetcher().fetch('AAPL', RANGE));

    expect(result.bars).toHaveLength(10);
    expect(events.ofType('chunk-retry').map((e) => e.reason)).toEqual(['provider error']);
  });

  it('should flag reconciliation warnings without failing', async () => {
    session.on('AAPL', () => ({
      ok: true,
      bars: [makeBar('2020-01-03', 2), makeBar('2020-01-02', 1)],
    }));

    const result = expectReconciled(await createFetcher().fetch('AAPL', RANGE));

    expect(result.bars.map((bar) => bar.date)).toEqual(['2020-01-02', '2020-01-03']);
    expect(events.ofType('reconciliation-warning')).toEqual([
      {
        type: 'reconciliation-warning',
        symbol: 'AAPL',
        warnings: [{ kind: 'out-of-order', date: '2020-01-02', chunkIndex: 0 }],
      },
    ]);
  });

  it('should report bars dropped outside the range', async () => {
    session.on('AAPL', () => ({
      ok: true,
      bars: [makeBar('2019-12-30', 1), makeBar('2019-12-31', 1), makeBar('2020-01-02', 2)],
    }));

    await createFetcher().fetch('AAPL', RANGE);

    expect(events.ofType('series-reconciled')).toEqual([
      { type: 'series-reconciled', symbol: 'AAPL', barCount: 1, droppedOutOfRange: 2 },
    ]);
  });

  it('should warn when a response hit the provider cap', async () => {
    session.on('AAPL', () => ({ ok: true, bars: [makeBar('2020-01-02', 1)], truncated: true }));

    const result = expectReconciled(await createFetcher().fetch('AAPL', RANGE));

    expect(result.warnings).toEqual([{ kind: 'truncated-response', date: '2020-01-02', chunkIndex: 0 }]);
  });

  it('should report every state transition', async () => {
    const transitions: FetchTransition[] = [];
    session.on('AAPL', (_chunk, attempt) =>
      attempt === 1
        ? { ok: false, error: new RequestTimeoutError(45_000) }
        : { ok: true, bars: [makeBar('2020-01-02', 1)] }
    );

    await createFetcher({ onTransition: (t) => transitions.push(t) }).fetch('AAPL', RANGE);

    expect(transitions.map((t) => t.to)).toEqual([
      'fetching-chunk',
      'chunk-failed',
      'retrying',
      'fetching-chunk',
      'chunk-succeeded',
      'reconciled',
    ]);
  });
});
