import type { Bar, Chunk, SecurityKind } from '../market/bar.schema';
import type { ProviderError } from './errors';

/**
 * Outcome of one bounded bars request. Sessions never throw from requestBars.
 */
export type BarsResponse =
  | {
      ok: true;
      bars: Bar[];
      /** The provider's per-response cap was reached; bars of the window may be missing */
      truncated?: boolean;
    }
  | { ok: false; error: ProviderError };

/**
 * Single logical connection to the historical data provider
 *
 * One instance serves the whole batch run and must only be used sequentially.
 */
export interface IProviderSession {
  /**
   * Establish the session.
   * @throws ConnectionError when the upstream process is unreachable
   */
  connect(): Promise<void>;

  /** Release the session. Safe to call more than once. */
  disconnect(): Promise<void>;

  isConnected(): boolean;

  /**
   * Issue one request for the bars of `symbol` within `chunk`.
   * Applies an internal timeout and converts it into a transient error.
   */
  requestBars(symbol: string, chunk: Chunk, kindHint: SecurityKind): Promise<BarsResponse>;
}
