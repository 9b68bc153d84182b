import type { Clock } from '../clock';

export interface ThrottleOptions {
  /** Minimum time between the start of one request and the start of the next */
  minSpacingMs: number;
  clock: Clock;
}

export const DEFAULT_REQUEST_SPACING_MS = 3000;

/**
 * Shared pacing gate for every provider request of a batch run
 *
 * Spacing is measured start-to-start, so a request that fails fast still
 * holds back the next one. Callers are served in call order.
 */
export class Throttle {
  private minSpacingMs: number;
  private clock: Clock;
  private lastStartAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: ThrottleOptions) {
    if (options.minSpacingMs < 0) {
      throw new RangeError(`Request spacing must not be negative, got ${options.minSpacingMs}`);
    }
    this.minSpacingMs = options.minSpacingMs;
    this.clock = options.clock;
  }

  /**
   * Resolve when the caller may start its request. Never rejects.
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot());
    this.queue = turn;
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastStartAt !== null) {
      const waitMs = this.lastStartAt + this.minSpacingMs - this.clock.now();
      if (waitMs > 0) {
        await this.clock.sleep(waitMs);
      }
    }
    this.lastStartAt = this.clock.now();
  }
}
