import { z } from 'zod';

// ============================================
// Symbol fetch lifecycle
// ============================================

export const FetchPhaseSchema = z.enum([
  'planning',
  'fetching-chunk',
  'chunk-succeeded',
  'chunk-failed',
  'retrying',
  'reconciled',
  'failed',
]);

export type FetchPhase = z.infer<typeof FetchPhaseSchema>;

/**
 * Allowed transitions of the per-symbol state machine.
 *
 * planning        -> fetching-chunk | failed          (failed: unknown kind, cancelled)
 * fetching-chunk  -> chunk-succeeded | chunk-failed
 * chunk-succeeded -> fetching-chunk | reconciled | failed
 * chunk-failed    -> retrying | failed                (retrying: transient, budget left)
 * retrying        -> fetching-chunk | failed          (failed: cancelled during backoff)
 * reconciled      -> (terminal)
 * failed          -> (terminal)
 */
export const FETCH_TRANSITIONS = {
  planning: ['fetching-chunk', 'failed'],
  'fetching-chunk': ['chunk-succeeded', 'chunk-failed'],
  'chunk-succeeded': ['fetching-chunk', 'reconciled', 'failed'],
  'chunk-failed': ['retrying', 'failed'],
  retrying: ['fetching-chunk', 'failed'],
  reconciled: [],
  failed: [],
} as const satisfies Record<FetchPhase, readonly FetchPhase[]>;
