import type { BorrowRecord, MinuteBucket, PoolStatus, Snapshot } from '../types/realtime.js';

/** Chart windows offered by the dashboard, in seconds. */
export const TIME_RANGES = [60, 300, 600, 1800, 3600, 10800, 21600] as const;

export const DEFAULT_TIME_RANGE = 1800;

export function timeRangeLabel(seconds: number): string {
  if (seconds < 60) return `${seconds} seconds`;
  if (seconds < 3600) return `${Math.round(seconds / 60)} minutes`;
  return `${Math.round(seconds / 3600)} hour${seconds > 3600 ? 's' : ''}`;
}

export interface OverviewPoint {
  timestamp: string;
  count: number;
  overageCount: number;
}

export interface UtilizationRow {
  tool: string;
  label: string;
  inCommit: number;
  inOverage: number;
  available: number;
}

export type OverageSeverity = 'normal' | 'warning' | 'critical';

/** Buckets no older than `windowSeconds` before `now`. */
export function filterWindow(series: readonly MinuteBucket[], windowSeconds: number, now = Date.now()): MinuteBucket[] {
  const cutoff = now - windowSeconds * 1000;
  return series.filter((bucket) => new Date(bucket.timestamp).getTime() >= cutoff);
}

/**
 * Sum every pool's series into one per-minute series for the overview
 * charts, oldest minute first.
 */
export function aggregateOverview(
  toolMetrics: Snapshot['tool_metrics'],
  windowSeconds: number,
  now = Date.now()
): OverviewPoint[] {
  const byMinute = new Map<string, OverviewPoint>();

  for (const series of Object.values(toolMetrics)) {
    for (const bucket of filterWindow(series, windowSeconds, now)) {
      const point = byMinute.get(bucket.timestamp) ?? { timestamp: bucket.timestamp, count: 0, overageCount: 0 };
      point.count += bucket.count;
      point.overageCount += bucket.overage_count;
      byMinute.set(bucket.timestamp, point);
    }
  }

  return [...byMinute.values()].sort(
    (a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime()
  );
}

// "Vendor - Product" → "Product"
export function shortToolName(tool: string): string {
  const parts = tool.split(' - ');
  return parts.length > 1 ? parts[1] : tool;
}

export function utilization(tools: readonly PoolStatus[]): UtilizationRow[] {
  return [...tools]
    .sort((a, b) => a.tool.localeCompare(b.tool))
    .map((pool) => ({
      tool: pool.tool,
      label: shortToolName(pool.tool),
      inCommit: Math.min(pool.borrowed, pool.commit),
      inOverage: pool.overage,
      available: pool.available,
    }));
}

/** Outstanding seats per holder for one pool. */
export function holderDistribution(borrows: readonly BorrowRecord[], tool: string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const borrow of borrows) {
    if (borrow.tool === tool) {
      counts[borrow.user] = (counts[borrow.user] ?? 0) + 1;
    }
  }
  return counts;
}

export function overageSeverity(overagePercent: number): OverageSeverity {
  if (overagePercent > 30) return 'critical';
  if (overagePercent > 15) return 'warning';
  return 'normal';
}

export function totalBorrowed(tools: readonly PoolStatus[]): number {
  return tools.reduce((sum, pool) => sum + pool.borrowed, 0);
}
