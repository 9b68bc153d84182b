import type { ErrorClassification } from '@quarry/schemas';

export type RetryDecision = { action: 'retry'; delayMs: number } | { action: 'give-up' };

/**
 * Decides, after a failed chunk request, whether to issue it again
 */
export interface RetryPolicy {
  /**
   * @param attemptsMade - Requests issued for the chunk so far, including the failed one
   */
  decide(attemptsMade: number, classification: ErrorClassification): RetryDecision;
}

export interface LinearRetryConfig {
  /** Retries per chunk on top of the first attempt (default: 2) */
  maxRetries: number;
  /** Delay before the first retry; the n-th retry waits n times this (default: 3000) */
  baseDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: LinearRetryConfig = {
  maxRetries: 2,
  baseDelayMs: 3000,
};

const GIVE_UP: RetryDecision = { action: 'give-up' };

/**
 * Retries transient failures with linearly growing delays (3s, 6s, ...).
 * Terminal failures are never retried.
 */
export class LinearRetryPolicy implements RetryPolicy {
  private config: LinearRetryConfig;

  constructor(config: Partial<LinearRetryConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    if (this.config.maxRetries < 0 || this.config.baseDelayMs < 0) {
      throw new RangeError('Retry limits must not be negative');
    }
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  decide(attemptsMade: number, classification: ErrorClassification): RetryDecision {
    if (classification === 'terminal') return GIVE_UP;
    if (attemptsMade > this.config.maxRetries) return GIVE_UP;
    return { action: 'retry', delayMs: this.config.baseDelayMs * attemptsMade };
  }
}
