import type { FailureReason } from '../ledger/types.js';

export type EventCategory = 'borrow' | 'return' | 'failure';

/** Observation of one ledger transition. Not authoritative. */
export interface LedgerEvent {
  readonly kind: EventCategory;
  readonly poolName: string;
  readonly holder: string;
  /** Epoch milliseconds. */
  readonly timestamp: number;
  readonly isOverage: boolean;
  readonly failureReason?: FailureReason;
}

/** Borrow activity of one pool within one minute. */
export interface MinuteBucket {
  readonly poolName: string;
  /** Epoch milliseconds, floored to the minute. */
  readonly minuteTimestamp: number;
  readonly borrowCount: number;
  readonly overageCount: number;
  readonly distinctHolders: readonly string[];
}

export interface BufferStats {
  totalEvents: number;
  byCategory: Record<EventCategory, number>;
  droppedAppends: number;
}

/** Write side of the buffer, as seen by the ledger. */
export interface EventRecorder {
  record(event: LedgerEvent): void;
}

/** Read side of the buffer, as seen by aggregation and publishing. */
export interface EventSource {
  recent(category: EventCategory, since: number): readonly LedgerEvent[];
  seriesFor(poolName: string): MinuteBucket[];
  stats(): BufferStats;
  prune(): void;
}

export interface Rates {
  borrowPerMin: number;
  returnPerMin: number;
  failurePerMin: number;
  overagePercent: number;
}
