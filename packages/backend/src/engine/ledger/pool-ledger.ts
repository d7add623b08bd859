import { randomUUID } from 'crypto';
import {
  BufferAppendError,
  CapacityExceededError,
  NotFoundError,
  PoolInactiveError,
  UnknownBorrowError,
  ValidationError,
} from '../../lib/errors.js';
import type { EngineLogger } from '../logger.js';
import type { EventRecorder, LedgerEvent } from '../telemetry/types.js';
import { KeyedMutex } from './keyed-mutex.js';
import type {
  AllocationOutcome,
  Borrow,
  BorrowResult,
  HistorySink,
  LedgerMetrics,
  PoolConfig,
  PoolSeed,
  PoolState,
  PoolStatus,
  ReturnedBorrow,
  StoredPool,
} from './types.js';

export interface PoolLedgerOptions {
  events: EventRecorder;
  logger: EngineLogger;
  history?: HistorySink;
  metrics?: LedgerMetrics;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Authoritative state of every seat pool.
 *
 * Each pool has its own exclusive section. The section covers the capacity
 * check and the counter update only; event recording happens as the section
 * is released and persistence after that, so neither can hold up other
 * callers on the same pool.
 */
export class PoolLedger {
  private readonly pools = new Map<string, PoolState>();
  private readonly outstanding = new Map<string, Borrow>();
  private readonly mutex = new KeyedMutex();
  private readonly events: EventRecorder;
  private readonly history?: HistorySink;
  private readonly metrics?: LedgerMetrics;
  private readonly logger: EngineLogger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(seeds: readonly PoolSeed[], options: PoolLedgerOptions) {
    this.events = options.events;
    this.history = options.history;
    this.metrics = options.metrics;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;

    for (const seed of seeds) {
      assertValidConfig(seed);
      this.pools.set(seed.name, {
        ...pickConfig(seed),
        borrowedCount: 0,
        accruedOverageCost: seed.accruedOverageCost ?? 0,
        overageBorrows: seed.overageBorrows ?? 0,
        active: seed.active ?? true,
      });
    }
  }

  // ── Borrow / return ──────────────────────────────────────────────────────

  async borrow(poolName: string, holder: string): Promise<BorrowResult> {
    const started = performance.now();
    this.metrics?.borrowAttempted(poolName, holder);

    const outcome = await this.mutex.runExclusive(
      poolName,
      () => this.allocate(poolName, holder),
      (result) => this.recordEvent(this.eventFor(poolName, holder, result))
    );
    const durationSeconds = (performance.now() - started) / 1000;

    if (!outcome.ok) {
      this.metrics?.borrowFailed(poolName, outcome.reason, durationSeconds);
      this.logger.warn({ pool: poolName, holder, reason: outcome.reason }, 'borrow failed');
      switch (outcome.reason) {
        case 'unknown_tool':
          throw new NotFoundError('Pool', poolName);
        case 'inactive':
          throw new PoolInactiveError(poolName);
        default:
          throw new CapacityExceededError(poolName, outcome.reason);
      }
    }

    const { borrow, charge } = outcome;
    await this.persist('borrow', (sink) => sink.borrowed(borrow, charge));

    const pool = this.pools.get(poolName);
    this.metrics?.borrowSucceeded(poolName, holder, borrow.isOverage, durationSeconds);
    this.reportPool(pool);
    this.logger.info(
      {
        pool: poolName,
        holder,
        borrowId: borrow.id,
        borrowed: pool?.borrowedCount,
        total: pool?.totalCapacity,
        overage: borrow.isOverage,
      },
      'borrow success'
    );

    return {
      borrowId: borrow.id,
      poolName,
      holder,
      borrowedAt: borrow.borrowedAt,
      isOverage: borrow.isOverage,
    };
  }

  /** Return an outstanding borrow. Accrued overage cost is left as it is. */
  async return(borrowId: string): Promise<ReturnedBorrow> {
    const known = this.outstanding.get(borrowId);
    if (!known) {
      this.logger.warn({ borrowId }, 'return failed: not outstanding');
      throw new UnknownBorrowError(borrowId);
    }

    const returned = await this.mutex.runExclusive(
      known.poolName,
      () => this.release(borrowId),
      (result) => {
        if (result) {
          this.recordEvent({
            kind: 'return',
            poolName: result.poolName,
            holder: result.holder,
            timestamp: result.returnedAt.getTime(),
            isOverage: result.isOverage,
          });
        }
      }
    );

    // Lost a race with another return of the same id.
    if (!returned) {
      this.logger.warn({ borrowId }, 'return failed: not outstanding');
      throw new UnknownBorrowError(borrowId);
    }

    await this.persist('return', (sink) => sink.returned(returned));

    const pool = this.pools.get(returned.poolName);
    this.reportPool(pool);
    this.logger.info(
      { pool: returned.poolName, borrowId, borrowed: pool?.borrowedCount, total: pool?.totalCapacity },
      'return success'
    );
    return returned;
  }

  // ── Reads ────────────────────────────────────────────────────────────────

  /** Consistent read of one pool, taken in that pool's own section. */
  async status(poolName: string): Promise<PoolStatus> {
    const status = await this.mutex.runExclusive(poolName, () => {
      const pool = this.pools.get(poolName);
      return pool ? toStatus(pool) : undefined;
    });
    if (!status) {
      throw new NotFoundError('Pool', poolName);
    }
    return status;
  }

  /**
   * Every pool, sorted by name. Pools are read one at a time, so the result
   * is not a single cross-pool consistency point.
   */
  async statusAll(): Promise<PoolStatus[]> {
    const statuses: PoolStatus[] = [];
    for (const name of this.poolNames()) {
      const status = await this.mutex.runExclusive(name, () => {
        const pool = this.pools.get(name);
        return pool ? toStatus(pool) : undefined;
      });
      if (status) {
        statuses.push(status);
      }
    }
    return statuses;
  }

  poolNames(): string[] {
    return [...this.pools.keys()].sort((a, b) => a.localeCompare(b));
  }

  /** Outstanding borrows, newest first, optionally for one holder. */
  listBorrows(holder?: string): Borrow[] {
    return [...this.outstanding.values()]
      .filter((borrow) => holder === undefined || borrow.holder === holder)
      .sort((a, b) => b.borrowedAt.getTime() - a.borrowedAt.getTime());
  }

  // ── Administration ───────────────────────────────────────────────────────

  /**
   * Create a pool, or update the configuration of an existing one. An update
   * reactivates a deactivated pool. It may not shrink capacity below the
   * seats currently borrowed, nor leave more overage in use than the new
   * max overage allows.
   */
  async provision(config: PoolConfig): Promise<PoolStatus> {
    assertValidConfig(config);

    const state = await this.mutex.runExclusive(config.name, () => {
      const existing = this.pools.get(config.name);
      if (!existing) {
        const created: PoolState = {
          ...pickConfig(config),
          borrowedCount: 0,
          accruedOverageCost: 0,
          overageBorrows: 0,
          active: true,
        };
        this.pools.set(config.name, created);
        return created;
      }
      if (existing.borrowedCount > config.totalCapacity) {
        throw new ValidationError('Total cannot be reduced below current borrows', {
          tool: config.name,
          borrowed: existing.borrowedCount,
          requestedTotal: config.totalCapacity,
        });
      }
      const overageInUse = Math.max(existing.borrowedCount - config.commitQuantity, 0);
      if (overageInUse > config.maxOverage) {
        throw new ValidationError('Overage in use would exceed max overage', {
          tool: config.name,
          borrowed: existing.borrowedCount,
          requestedCommit: config.commitQuantity,
          requestedMaxOverage: config.maxOverage,
        });
      }
      Object.assign(existing, pickConfig(config), { active: true });
      return existing;
    });

    await this.persist('provision', (sink) => sink.poolSaved(toStored(state)));
    this.reportPool(state);
    this.logger.info(
      {
        pool: config.name,
        total: config.totalCapacity,
        commit: config.commitQuantity,
        maxOverage: config.maxOverage,
        commitFee: config.commitFee,
        overageUnitPrice: config.overageUnitPrice,
      },
      'pool provisioned'
    );
    return toStatus(state);
  }

  /** Soft-deactivate: new borrows are refused, outstanding ones may return. */
  async deactivate(poolName: string): Promise<PoolStatus> {
    const state = await this.mutex.runExclusive(poolName, () => {
      const pool = this.pools.get(poolName);
      if (pool) {
        pool.active = false;
      }
      return pool;
    });
    if (!state) {
      throw new NotFoundError('Pool', poolName);
    }

    await this.persist('deactivate', (sink) => sink.poolSaved(toStored(state)));
    this.logger.info({ pool: poolName, borrowed: state.borrowedCount }, 'pool deactivated');
    return toStatus(state);
  }

  /**
   * Re-attach borrows that were outstanding when the process last stopped.
   * Borrows for unknown pools, or beyond a pool's capacity, are skipped.
   */
  restoreBorrows(borrows: readonly Borrow[]): number {
    let restored = 0;
    for (const borrow of borrows) {
      const pool = this.pools.get(borrow.poolName);
      if (!pool || pool.borrowedCount >= pool.totalCapacity || this.outstanding.has(borrow.id)) {
        this.logger.warn({ borrowId: borrow.id, pool: borrow.poolName }, 'skipping outstanding borrow on restore');
        continue;
      }
      pool.borrowedCount += 1;
      this.outstanding.set(borrow.id, borrow);
      restored++;
    }
    return restored;
  }

  // ── Critical sections ────────────────────────────────────────────────────

  private allocate(poolName: string, holder: string): AllocationOutcome {
    const pool = this.pools.get(poolName);
    if (!pool) {
      return { ok: false, reason: 'unknown_tool', isOverage: false };
    }
    if (!pool.active) {
      return { ok: false, reason: 'inactive', isOverage: false };
    }
    if (pool.borrowedCount >= pool.totalCapacity) {
      return { ok: false, reason: 'exhausted', isOverage: false };
    }

    const isOverage = pool.borrowedCount >= pool.commitQuantity;
    if (isOverage && pool.borrowedCount - pool.commitQuantity >= pool.maxOverage) {
      return { ok: false, reason: 'max_overage', isOverage: true };
    }

    pool.borrowedCount += 1;
    const borrow: Borrow = {
      id: this.generateId(),
      poolName,
      holder,
      borrowedAt: this.now(),
      isOverage,
    };
    this.outstanding.set(borrow.id, borrow);

    if (!isOverage) {
      return { ok: true, borrow };
    }

    pool.accruedOverageCost += pool.overageUnitPrice;
    pool.overageBorrows += 1;
    if (pool.overageUnitPrice <= 0) {
      return { ok: true, borrow };
    }
    return {
      ok: true,
      borrow,
      charge: {
        id: this.generateId(),
        poolName,
        borrowId: borrow.id,
        holder,
        chargedAt: borrow.borrowedAt,
        amount: pool.overageUnitPrice,
      },
    };
  }

  private release(borrowId: string): ReturnedBorrow | undefined {
    const borrow = this.outstanding.get(borrowId);
    if (!borrow) {
      return undefined;
    }
    const pool = this.pools.get(borrow.poolName);
    if (pool && pool.borrowedCount > 0) {
      pool.borrowedCount -= 1;
    }
    this.outstanding.delete(borrowId);
    return { ...borrow, returnedAt: this.now() };
  }

  // ── Helpers ──────────────────────────────────────────────────────────────

  private eventFor(poolName: string, holder: string, outcome: AllocationOutcome): LedgerEvent {
    if (outcome.ok) {
      return {
        kind: 'borrow',
        poolName,
        holder,
        timestamp: outcome.borrow.borrowedAt.getTime(),
        isOverage: outcome.borrow.isOverage,
      };
    }
    return {
      kind: 'failure',
      poolName,
      holder,
      timestamp: this.now().getTime(),
      isOverage: outcome.isOverage,
      failureReason: outcome.reason,
    };
  }

  /** Logged, never thrown: the transition has already committed. */
  private recordEvent(event: LedgerEvent): void {
    try {
      this.events.record(event);
    } catch (err) {
      this.logger.error(
        { err: new BufferAppendError(event.kind, err), pool: event.poolName },
        'ledger event not recorded'
      );
    }
  }

  private reportPool(pool: PoolState | undefined): void {
    if (pool) {
      this.metrics?.poolChanged(toStatus(pool));
    }
  }

  private async persist(action: string, write: (sink: HistorySink) => Promise<void>): Promise<void> {
    if (!this.history) {
      return;
    }
    try {
      await write(this.history);
    } catch (err) {
      this.logger.error({ err, action }, 'history write failed');
    }
  }
}

// ── Module helpers ─────────────────────────────────────────────────────────

function pickConfig(config: PoolConfig): PoolConfig {
  return {
    name: config.name,
    totalCapacity: config.totalCapacity,
    commitQuantity: config.commitQuantity,
    maxOverage: config.maxOverage,
    commitFee: config.commitFee,
    overageUnitPrice: config.overageUnitPrice,
  };
}

function assertValidConfig(config: PoolConfig): void {
  const problems: string[] = [];
  if (!config.name) problems.push('name is required');
  if (!Number.isInteger(config.totalCapacity) || config.totalCapacity < 0) {
    problems.push('totalCapacity must be a non-negative integer');
  }
  if (
    !Number.isInteger(config.commitQuantity) ||
    config.commitQuantity < 0 ||
    config.commitQuantity > config.totalCapacity
  ) {
    problems.push('commitQuantity must be an integer between 0 and totalCapacity');
  }
  if (!Number.isInteger(config.maxOverage) || config.maxOverage < 0) {
    problems.push('maxOverage must be a non-negative integer');
  }
  if (config.commitFee < 0 || config.overageUnitPrice < 0) {
    problems.push('prices must not be negative');
  }
  if (problems.length > 0) {
    throw new ValidationError(`Invalid configuration for pool '${config.name}'`, { problems });
  }
}

function toStored(state: PoolState): StoredPool {
  return { ...pickConfig(state), active: state.active };
}

export function toStatus(pool: PoolState): PoolStatus {
  return {
    name: pool.name,
    total: pool.totalCapacity,
    borrowed: pool.borrowedCount,
    available: Math.max(pool.totalCapacity - pool.borrowedCount, 0),
    commit: pool.commitQuantity,
    maxOverage: pool.maxOverage,
    overage: Math.max(pool.borrowedCount - pool.commitQuantity, 0),
    inCommit: pool.borrowedCount <= pool.commitQuantity,
    commitFee: pool.commitFee,
    overageUnitPrice: pool.overageUnitPrice,
    overageBorrows: pool.overageBorrows,
    accruedOverageCost: pool.accruedOverageCost,
    totalCost: pool.commitFee + pool.accruedOverageCost,
    active: pool.active,
  };
}
