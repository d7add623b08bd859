import { describe, it, expect } from 'vitest';
import { EventBuffer, floorToMinute } from '../engine/telemetry/event-buffer.js';
import type { LedgerEvent } from '../engine/telemetry/types.js';
import { BufferAppendError } from '../lib/errors.js';
import { createTestLogger } from './setup.js';

const T0 = Date.UTC(2026, 0, 5, 12, 0, 0);
const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

function event(overrides: Partial<LedgerEvent> = {}): LedgerEvent {
  return {
    kind: 'borrow',
    poolName: 'cad-suite',
    holder: 'alice',
    timestamp: T0,
    isOverage: false,
    ...overrides,
  };
}

function createBuffer(
  options: { retentionMs?: number; maxEventsPerCategory?: number; maxHoldersPerBucket?: number } = {}
) {
  const clock = { now: T0 };
  const buffer = new EventBuffer({
    logger: createTestLogger(),
    now: () => clock.now,
    ...options,
  });
  return { buffer, clock };
}

describe('EventBuffer', () => {
  it('floors timestamps to the minute', () => {
    expect(floorToMinute(T0 + 59_999)).toBe(T0);
    expect(floorToMinute(T0 + MINUTE)).toBe(T0 + MINUTE);
  });

  it('returns events of one category since a cutoff, oldest first', () => {
    const { buffer } = createBuffer();
    buffer.record(event({ holder: 'alice', timestamp: T0 }));
    buffer.record(event({ holder: 'bob', timestamp: T0 + 1000 }));
    buffer.record(event({ kind: 'return', holder: 'alice', timestamp: T0 + 2000 }));
    buffer.record(event({ holder: 'carol', timestamp: T0 + 3000 }));

    expect(buffer.recent('borrow', T0 + 1000).map((e) => e.holder)).toEqual(['bob', 'carol']);
    expect(buffer.recent('return', T0).map((e) => e.holder)).toEqual(['alice']);
    expect(buffer.recent('failure', T0)).toEqual([]);
  });

  it('builds per-minute buckets from borrow events', () => {
    const { buffer } = createBuffer();
    buffer.record(event({ holder: 'alice', timestamp: T0 + 5_000 }));
    buffer.record(event({ holder: 'alice', timestamp: T0 + 10_000, isOverage: true }));
    buffer.record(event({ holder: 'bob', timestamp: T0 + 20_000 }));
    buffer.record(event({ holder: 'carol', timestamp: T0 + MINUTE + 1_000, isOverage: true }));
    buffer.record(event({ kind: 'return', holder: 'bob', timestamp: T0 + MINUTE + 2_000 }));

    expect(buffer.seriesFor('cad-suite')).toEqual([
      {
        poolName: 'cad-suite',
        minuteTimestamp: T0,
        borrowCount: 3,
        overageCount: 1,
        distinctHolders: ['alice', 'bob'],
      },
      {
        poolName: 'cad-suite',
        minuteTimestamp: T0 + MINUTE,
        borrowCount: 1,
        overageCount: 1,
        distinctHolders: ['carol'],
      },
    ]);
    expect(buffer.seriesFor('other-tool')).toEqual([]);
  });

  it('drops events and buckets older than the retention window', () => {
    const { buffer, clock } = createBuffer({ retentionMs: 6 * HOUR });
    buffer.record(event({ holder: 'early', timestamp: T0 }));
    buffer.record(event({ holder: 'late', timestamp: T0 + 2 * HOUR }));

    clock.now = T0 + 6 * HOUR + MINUTE;
    buffer.prune();

    expect(buffer.recent('borrow', 0).map((e) => e.holder)).toEqual(['late']);
    expect(buffer.seriesFor('cad-suite').map((b) => b.minuteTimestamp)).toEqual([T0 + 2 * HOUR]);
    expect(buffer.stats().totalEvents).toBe(1);
  });

  it('keeps at most the newest events per category', () => {
    const { buffer } = createBuffer({ maxEventsPerCategory: 3 });
    for (let i = 0; i < 5; i++) {
      buffer.record(event({ holder: `user-${i}`, timestamp: T0 + i * 1000 }));
    }
    buffer.record(event({ kind: 'failure', holder: 'dave', timestamp: T0 + 6000, failureReason: 'exhausted' }));

    expect(buffer.recent('borrow', 0).map((e) => e.holder)).toEqual(['user-2', 'user-3', 'user-4']);
    expect(buffer.stats()).toEqual({
      totalEvents: 4,
      byCategory: { borrow: 3, return: 0, failure: 1 },
      droppedAppends: 0,
    });
  });

  it('forgets a pool series once every bucket has expired', () => {
    const { buffer, clock } = createBuffer({ retentionMs: HOUR });
    buffer.record(event({ timestamp: T0 }));

    clock.now = T0 + 2 * HOUR;
    buffer.prune();

    expect(buffer.seriesFor('cad-suite')).toEqual([]);
    expect(buffer.stats().totalEvents).toBe(0);
  });

  it('drops an event that is already outside the retention window', () => {
    const { buffer } = createBuffer({ retentionMs: 6 * HOUR });
    buffer.record(event({ holder: 'fresh', timestamp: T0 - 1000 }));
    buffer.record(event({ holder: 'stale', timestamp: T0 - 7 * HOUR }));

    expect(buffer.recent('borrow', 0).map((e) => e.holder)).toEqual(['fresh']);
    expect(buffer.seriesFor('cad-suite').map((b) => b.minuteTimestamp)).toEqual([T0 - MINUTE]);
    expect(buffer.stats()).toEqual({
      totalEvents: 1,
      byCategory: { borrow: 1, return: 0, failure: 0 },
      droppedAppends: 0,
    });
  });

  it('keeps late events in timestamp order', () => {
    const { buffer } = createBuffer();
    buffer.record(event({ holder: 'bob', timestamp: T0 + 3000 }));
    buffer.record(event({ holder: 'alice', timestamp: T0 + 1000 }));
    buffer.record(event({ holder: 'carol', timestamp: T0 + 2000 }));

    expect(buffer.recent('borrow', 0).map((e) => e.holder)).toEqual(['alice', 'carol', 'bob']);
    expect(buffer.recent('borrow', T0 + 2000).map((e) => e.holder)).toEqual(['carol', 'bob']);
  });

  it('caps distinct holders per bucket but keeps counting borrows', () => {
    const { buffer } = createBuffer({ maxHoldersPerBucket: 50 });
    for (let i = 0; i < 60; i++) {
      buffer.record(event({ holder: `user-${i}`, timestamp: T0 + i * 100 }));
    }

    const [bucket] = buffer.seriesFor('cad-suite');
    expect(bucket.borrowCount).toBe(60);
    expect(bucket.distinctHolders).toHaveLength(50);
    expect(bucket.distinctHolders[0]).toBe('user-0');
    expect(bucket.distinctHolders[49]).toBe('user-49');
  });

  it('counts and logs a failed append instead of throwing', () => {
    const logger = createTestLogger();
    const buffer = new EventBuffer({
      logger,
      now: () => {
        throw new Error('clock unavailable');
      },
    });

    expect(() => buffer.record(event())).not.toThrow();
    expect(buffer.stats()).toEqual({
      totalEvents: 0,
      byCategory: { borrow: 0, return: 0, failure: 0 },
      droppedAppends: 1,
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { err: expect.any(BufferAppendError), pool: 'cad-suite' },
      'event buffer append failed'
    );
  });
});
