import { BufferAppendError } from '../../lib/errors.js';
import type { EngineLogger } from '../logger.js';
import type {
  BufferStats,
  EventCategory,
  EventRecorder,
  EventSource,
  LedgerEvent,
  MinuteBucket,
} from './types.js';

export const DEFAULT_RETENTION_MS = 6 * 60 * 60 * 1000;
export const DEFAULT_MAX_EVENTS_PER_CATEGORY = 50_000;
export const DEFAULT_MAX_HOLDERS_PER_BUCKET = 50;

const MINUTE_MS = 60_000;

export interface EventBufferOptions {
  logger: EngineLogger;
  retentionMs?: number;
  /** Hard cap per category, applied regardless of age. */
  maxEventsPerCategory?: number;
  /** Distinct holders kept per minute bucket; counts are not capped. */
  maxHoldersPerBucket?: number;
  now?: () => number;
}

interface BucketState {
  minuteTimestamp: number;
  borrowCount: number;
  overageCount: number;
  holders: Set<string>;
}

export function floorToMinute(timestamp: number): number {
  return Math.floor(timestamp / MINUTE_MS) * MINUTE_MS;
}

/**
 * Bounded in-memory log of ledger events, one oldest-to-newest array per
 * category, plus a per-pool series of minute buckets for charting.
 *
 * Both structures are trimmed from the front: entries past the retention
 * window go first, then anything over the per-category cap.
 */
export class EventBuffer implements EventRecorder, EventSource {
  private readonly logs: Record<EventCategory, LedgerEvent[]> = {
    borrow: [],
    return: [],
    failure: [],
  };
  private readonly series = new Map<string, BucketState[]>();
  private readonly logger: EngineLogger;
  private readonly now: () => number;
  private droppedAppends = 0;

  readonly retentionMs: number;
  readonly maxEventsPerCategory: number;
  readonly maxHoldersPerBucket: number;

  constructor(options: EventBufferOptions) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.maxEventsPerCategory = options.maxEventsPerCategory ?? DEFAULT_MAX_EVENTS_PER_CATEGORY;
    this.maxHoldersPerBucket = options.maxHoldersPerBucket ?? DEFAULT_MAX_HOLDERS_PER_BUCKET;
  }

  /**
   * Best-effort: a failed append is logged and counted, never thrown.
   * Events already outside the retention window are dropped; late ones are
   * inserted in timestamp order.
   */
  record(event: LedgerEvent): void {
    try {
      const cutoff = this.now() - this.retentionMs;
      if (event.timestamp < cutoff) {
        return;
      }
      const log = this.logs[event.kind];
      log.splice(upperBound(log, event.timestamp), 0, event);
      if (event.kind === 'borrow') {
        this.addToBucket(event);
      }
      this.pruneBefore(cutoff);
    } catch (err) {
      this.droppedAppends += 1;
      this.logger.warn(
        { err: new BufferAppendError(event.kind, err), pool: event.poolName },
        'event buffer append failed'
      );
    }
  }

  /** Events of `category` with `timestamp >= since`, oldest first. */
  recent(category: EventCategory, since: number): readonly LedgerEvent[] {
    const log = this.logs[category];
    return log.slice(lowerBound(log, since));
  }

  seriesFor(poolName: string): MinuteBucket[] {
    const cutoff = this.now() - this.retentionMs;
    const buckets = this.series.get(poolName) ?? [];
    return buckets
      .filter((bucket) => bucket.minuteTimestamp >= cutoff)
      .map((bucket) => ({
        poolName,
        minuteTimestamp: bucket.minuteTimestamp,
        borrowCount: bucket.borrowCount,
        overageCount: bucket.overageCount,
        distinctHolders: [...bucket.holders],
      }));
  }

  stats(): BufferStats {
    const byCategory = {
      borrow: this.logs.borrow.length,
      return: this.logs.return.length,
      failure: this.logs.failure.length,
    };
    return {
      totalEvents: byCategory.borrow + byCategory.return + byCategory.failure,
      byCategory,
      droppedAppends: this.droppedAppends,
    };
  }

  prune(): void {
    this.pruneBefore(this.now() - this.retentionMs);
  }

  private pruneBefore(cutoff: number): void {
    for (const log of Object.values(this.logs)) {
      const expired = lowerBound(log, cutoff);
      if (expired > 0) {
        log.splice(0, expired);
      }
      const overflow = log.length - this.maxEventsPerCategory;
      if (overflow > 0) {
        log.splice(0, overflow);
      }
    }

    for (const [poolName, buckets] of this.series) {
      let expired = 0;
      while (expired < buckets.length && buckets[expired].minuteTimestamp < cutoff) {
        expired++;
      }
      if (expired === buckets.length) {
        this.series.delete(poolName);
      } else if (expired > 0) {
        buckets.splice(0, expired);
      }
    }
  }

  private addToBucket(event: LedgerEvent): void {
    const minute = floorToMinute(event.timestamp);
    let buckets = this.series.get(event.poolName);
    if (!buckets) {
      buckets = [];
      this.series.set(event.poolName, buckets);
    }

    // Usually the newest bucket; walk back for the rare late event.
    let index = buckets.length - 1;
    while (index >= 0 && buckets[index].minuteTimestamp > minute) {
      index--;
    }

    let bucket = index >= 0 ? buckets[index] : undefined;
    if (!bucket || bucket.minuteTimestamp !== minute) {
      bucket = { minuteTimestamp: minute, borrowCount: 0, overageCount: 0, holders: new Set() };
      buckets.splice(index + 1, 0, bucket);
    }

    bucket.borrowCount += 1;
    if (event.isOverage) {
      bucket.overageCount += 1;
    }
    if (bucket.holders.size < this.maxHoldersPerBucket) {
      bucket.holders.add(event.holder);
    }
  }
}

/** First index whose timestamp is > `timestamp`; the log is ordered by time. */
function upperBound(log: readonly LedgerEvent[], timestamp: number): number {
  let lo = 0;
  let hi = log.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (log[mid].timestamp <= timestamp) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/** First index whose timestamp is >= `since`; the log is ordered by time. */
function lowerBound(log: readonly LedgerEvent[], since: number): number {
  let lo = 0;
  let hi = log.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (log[mid].timestamp < since) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
