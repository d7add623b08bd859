import type { PoolStatus } from '../ledger/types.js';
import type { LedgerEvent, MinuteBucket, Rates } from '../telemetry/types.js';

/** One composed view of the pools and their recent activity. */
export interface Snapshot {
  /** Publishing cycle that produced it; non-decreasing per session. */
  readonly tick: number;
  readonly generatedAt: Date;
  readonly pools: readonly PoolStatus[];
  readonly rates: Rates;
  readonly recentBorrows: readonly LedgerEvent[];
  readonly series: Readonly<Record<string, readonly MinuteBucket[]>>;
  readonly bufferStats: { readonly totalEvents: number };
}

// ── Wire format ─────────────────────────────────────────────────────────────

export interface PoolStatusMessage {
  tool: string;
  total: number;
  borrowed: number;
  available: number;
  commit: number;
  max_overage: number;
  overage: number;
  in_commit: boolean;
  commit_price: number;
  overage_price_per_license: number;
  overage_borrows: number;
  current_overage_cost: number;
  total_cost: number;
  active: boolean;
}

export interface BorrowEventMessage {
  tool: string;
  user: string;
  timestamp: string;
  is_overage: boolean;
}

export interface MinuteBucketMessage {
  timestamp: string;
  count: number;
  overage_count: number;
  users: string[];
}

export interface SnapshotMessage {
  tick: number;
  generated_at: string;
  tools: PoolStatusMessage[];
  rates: {
    borrow_per_min: number;
    return_per_min: number;
    failure_per_min: number;
    overage_percent: number;
  };
  recent_events: { borrows: BorrowEventMessage[] };
  tool_metrics: Record<string, MinuteBucketMessage[]>;
  buffer_stats: { total_events: number };
}

export function toPoolStatusMessage(status: PoolStatus): PoolStatusMessage {
  return {
    tool: status.name,
    total: status.total,
    borrowed: status.borrowed,
    available: status.available,
    commit: status.commit,
    max_overage: status.maxOverage,
    overage: status.overage,
    in_commit: status.inCommit,
    commit_price: status.commitFee,
    overage_price_per_license: status.overageUnitPrice,
    overage_borrows: status.overageBorrows,
    current_overage_cost: status.accruedOverageCost,
    total_cost: status.totalCost,
    active: status.active,
  };
}

export function toSnapshotMessage(snapshot: Snapshot): SnapshotMessage {
  const toolMetrics: Record<string, MinuteBucketMessage[]> = {};
  for (const [poolName, buckets] of Object.entries(snapshot.series)) {
    toolMetrics[poolName] = buckets.map((bucket) => ({
      timestamp: new Date(bucket.minuteTimestamp).toISOString(),
      count: bucket.borrowCount,
      overage_count: bucket.overageCount,
      users: [...bucket.distinctHolders],
    }));
  }

  return {
    tick: snapshot.tick,
    generated_at: snapshot.generatedAt.toISOString(),
    tools: snapshot.pools.map(toPoolStatusMessage),
    rates: {
      borrow_per_min: snapshot.rates.borrowPerMin,
      return_per_min: snapshot.rates.returnPerMin,
      failure_per_min: snapshot.rates.failurePerMin,
      overage_percent: snapshot.rates.overagePercent,
    },
    recent_events: {
      borrows: snapshot.recentBorrows.map((event) => ({
        tool: event.poolName,
        user: event.holder,
        timestamp: new Date(event.timestamp).toISOString(),
        is_overage: event.isOverage,
      })),
    },
    tool_metrics: toolMetrics,
    buffer_stats: { total_events: snapshot.bufferStats.totalEvents },
  };
}

export function encodeSnapshot(snapshot: Snapshot): string {
  return JSON.stringify(toSnapshotMessage(snapshot));
}
