import type { EventCategory, EventSource, Rates } from './types.js';

export const DEFAULT_RATE_WINDOW_SECONDS = 60;

/**
 * Windowed rates over the event buffer. Holds no state of its own; every
 * call reads the buffer as it is at that moment.
 */
export class RateAggregator {
  constructor(
    private readonly source: EventSource,
    private readonly now: () => number = Date.now
  ) {}

  ratePerMinute(category: EventCategory, windowSeconds = DEFAULT_RATE_WINDOW_SECONDS): number {
    if (windowSeconds <= 0) {
      return 0;
    }
    const count = this.source.recent(category, this.windowStart(windowSeconds)).length;
    return count / (windowSeconds / 60);
  }

  /** Share of borrows in the window that were overage, 0–100. */
  overagePercent(windowSeconds = DEFAULT_RATE_WINDOW_SECONDS): number {
    if (windowSeconds <= 0) {
      return 0;
    }
    const borrows = this.source.recent('borrow', this.windowStart(windowSeconds));
    if (borrows.length === 0) {
      return 0;
    }
    const overage = borrows.filter((event) => event.isOverage).length;
    return (overage / borrows.length) * 100;
  }

  rates(windowSeconds = DEFAULT_RATE_WINDOW_SECONDS): Rates {
    return {
      borrowPerMin: this.ratePerMinute('borrow', windowSeconds),
      returnPerMin: this.ratePerMinute('return', windowSeconds),
      failurePerMin: this.ratePerMinute('failure', windowSeconds),
      overagePercent: this.overagePercent(windowSeconds),
    };
  }

  private windowStart(windowSeconds: number): number {
    return this.now() - windowSeconds * 1000;
  }
}
