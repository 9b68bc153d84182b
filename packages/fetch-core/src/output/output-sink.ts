import type { Bar } from '@quarry/schemas';

export interface OutputWriteResult {
  /** Where the series was persisted */
  path: string;
}

/**
 * Persists one reconciled series. Called once per successful symbol,
 * before the next symbol is fetched.
 */
export interface OutputSink {
  write(symbol: string, bars: readonly Bar[], destinationDir: string): Promise<OutputWriteResult>;
}
