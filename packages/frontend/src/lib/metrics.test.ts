import { describe, it, expect } from 'vitest';
import {
  aggregateOverview,
  filterWindow,
  holderDistribution,
  overageSeverity,
  shortToolName,
  timeRangeLabel,
  totalBorrowed,
  utilization,
} from './metrics.js';
import type { MinuteBucket, PoolStatus } from '../types/realtime.js';

const NOW = Date.UTC(2026, 0, 5, 12, 0, 0);

function bucket(minutesAgo: number, count: number, overage = 0, users: string[] = []): MinuteBucket {
  return {
    timestamp: new Date(NOW - minutesAgo * 60_000).toISOString(),
    count,
    overage_count: overage,
    users,
  };
}

function pool(tool: string, borrowed: number, commit: number, total: number): PoolStatus {
  return {
    tool,
    total,
    borrowed,
    available: total - borrowed,
    commit,
    max_overage: total - commit,
    overage: Math.max(0, borrowed - commit),
    in_commit: borrowed <= commit,
    commit_price: 0,
    overage_price_per_license: 0,
    overage_borrows: 0,
    current_overage_cost: 0,
    total_cost: 0,
    active: true,
  };
}

describe('timeRangeLabel', () => {
  it('labels seconds, minutes and hours', () => {
    expect(timeRangeLabel(30)).toBe('30 seconds');
    expect(timeRangeLabel(300)).toBe('5 minutes');
    expect(timeRangeLabel(3600)).toBe('1 hour');
    expect(timeRangeLabel(21600)).toBe('6 hours');
  });
});

describe('filterWindow', () => {
  it('keeps buckets inside the window, boundary included', () => {
    const series = [bucket(10, 1), bucket(5, 2), bucket(1, 3)];

    expect(filterWindow(series, 300, NOW).map((b) => b.count)).toEqual([2, 3]);
  });
});

describe('aggregateOverview', () => {
  it('sums pools per minute, oldest first', () => {
    const points = aggregateOverview(
      {
        'cad-suite': [bucket(2, 3, 1), bucket(1, 1)],
        viewer: [bucket(1, 2, 2), bucket(30, 9)],
      },
      600,
      NOW
    );

    expect(points).toEqual([
      { timestamp: '2026-01-05T11:58:00.000Z', count: 3, overageCount: 1 },
      { timestamp: '2026-01-05T11:59:00.000Z', count: 3, overageCount: 2 },
    ]);
  });

  it('returns nothing for empty metrics', () => {
    expect(aggregateOverview({}, 600, NOW)).toEqual([]);
  });
});

describe('utilization', () => {
  it('splits seats into commit, overage and available, sorted by tool', () => {
    const rows = utilization([pool('Vendor B - Viewer', 2, 5, 10), pool('Vendor A - Designer', 8, 5, 20)]);

    expect(rows).toEqual([
      { tool: 'Vendor A - Designer', label: 'Designer', inCommit: 5, inOverage: 3, available: 12 },
      { tool: 'Vendor B - Viewer', label: 'Viewer', inCommit: 2, inOverage: 0, available: 8 },
    ]);
  });
});

describe('shortToolName', () => {
  it('keeps names without a vendor prefix', () => {
    expect(shortToolName('cad-suite')).toBe('cad-suite');
    expect(shortToolName('Vendor - Product')).toBe('Product');
  });
});

describe('holderDistribution', () => {
  it('counts outstanding seats per user for one pool', () => {
    const borrows = [
      { id: '1', tool: 'cad-suite', user: 'alice', borrowed_at: '2026-01-05T11:00:00.000Z', is_overage: false },
      { id: '2', tool: 'cad-suite', user: 'alice', borrowed_at: '2026-01-05T11:01:00.000Z', is_overage: false },
      { id: '3', tool: 'cad-suite', user: 'bob', borrowed_at: '2026-01-05T11:02:00.000Z', is_overage: false },
      { id: '4', tool: 'viewer', user: 'carol', borrowed_at: '2026-01-05T11:03:00.000Z', is_overage: false },
    ];

    expect(holderDistribution(borrows, 'cad-suite')).toEqual({ alice: 2, bob: 1 });
  });
});

describe('overageSeverity', () => {
  it('grades the overage percentage', () => {
    expect(overageSeverity(15)).toBe('normal');
    expect(overageSeverity(15.5)).toBe('warning');
    expect(overageSeverity(30.1)).toBe('critical');
  });
});

describe('totalBorrowed', () => {
  it('sums every pool', () => {
    expect(totalBorrowed([pool('a', 2, 1, 5), pool('b', 4, 4, 4)])).toBe(6);
  });
});
