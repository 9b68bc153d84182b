import { FETCH_TRANSITIONS, type FetchPhase } from '@quarry/schemas';

export interface FetchTransition {
  symbol: string;
  from: FetchPhase;
  to: FetchPhase;
  /** Chunk being worked on, when the transition concerns one */
  chunkIndex?: number;
}

export type TransitionObserver = (transition: FetchTransition) => void;

/**
 * Per-symbol fetch lifecycle. Validates every move against FETCH_TRANSITIONS.
 */
export class FetchStateMachine {
  private current: FetchPhase = 'planning';

  constructor(
    private readonly symbol: string,
    private readonly observer?: TransitionObserver
  ) {}

  /**
   * @throws Error if the transition is not allowed from the current phase
   */
  transition(to: FetchPhase, chunkIndex?: number): void {
    const from = this.current;
    const allowed: readonly FetchPhase[] = FETCH_TRANSITIONS[from];

    if (!allowed.includes(to)) {
      throw new Error(`Invalid fetch transition for ${this.symbol}: ${from} -> ${to}`);
    }

    const record: FetchTransition = { symbol: this.symbol, from, to, chunkIndex };
    this.current = to;
    this.observer?.(record);
  }

  get phase(): FetchPhase {
    return this.current;
  }
}
