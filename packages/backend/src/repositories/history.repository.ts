import type { SqliteDatabase } from '../lib/db.js';
import type { Borrow, OverageCharge, StoredPool } from '../engine/ledger/types.js';

export interface OverageTotals {
  poolName: string;
  overageBorrows: number;
  accruedOverageCost: number;
}

/** Durable record of pools, borrows and overage charges. */
export interface HistoryRepository {
  savePool(pool: StoredPool): Promise<void>;
  loadPools(): Promise<StoredPool[]>;
  recordBorrow(borrow: Borrow): Promise<void>;
  recordReturn(borrowId: string, returnedAt: Date): Promise<void>;
  recordOverageCharge(charge: OverageCharge): Promise<void>;
  listOutstanding(): Promise<Borrow[]>;
  listOverageCharges(poolName?: string): Promise<OverageCharge[]>;
  overageTotals(): Promise<OverageTotals[]>;
}

interface PoolRow {
  tool: string;
  total: number;
  commit_qty: number;
  max_overage: number;
  commit_price: number;
  overage_price_per_license: number;
  active: number;
}

interface BorrowRow {
  id: string;
  tool: string;
  user: string;
  borrowed_at: string;
  is_overage: number;
}

interface ChargeRow {
  id: string;
  tool: string;
  borrow_id: string;
  user: string;
  charged_at: string;
  amount: number;
}

interface TotalsRow {
  tool: string;
  overage_borrows: number;
  accrued: number;
}

export class SqliteHistoryRepository implements HistoryRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async savePool(pool: StoredPool): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO pools(tool, total, commit_qty, max_overage, commit_price, overage_price_per_license, active)
         VALUES (@tool, @total, @commit, @maxOverage, @commitPrice, @overagePrice, @active)
         ON CONFLICT(tool) DO UPDATE SET
           total = excluded.total,
           commit_qty = excluded.commit_qty,
           max_overage = excluded.max_overage,
           commit_price = excluded.commit_price,
           overage_price_per_license = excluded.overage_price_per_license,
           active = excluded.active`
      )
      .run({
        tool: pool.name,
        total: pool.totalCapacity,
        commit: pool.commitQuantity,
        maxOverage: pool.maxOverage,
        commitPrice: pool.commitFee,
        overagePrice: pool.overageUnitPrice,
        active: pool.active ? 1 : 0,
      });
  }

  async loadPools(): Promise<StoredPool[]> {
    const rows = this.db
      .prepare<[], PoolRow>(
        `SELECT tool, total, commit_qty, max_overage, commit_price, overage_price_per_license, active
         FROM pools ORDER BY tool ASC`
      )
      .all();

    return rows.map((row) => ({
      name: row.tool,
      totalCapacity: row.total,
      commitQuantity: row.commit_qty,
      maxOverage: row.max_overage,
      commitFee: row.commit_price,
      overageUnitPrice: row.overage_price_per_license,
      active: row.active === 1,
    }));
  }

  async recordBorrow(borrow: Borrow): Promise<void> {
    this.db
      .prepare('INSERT INTO borrows(id, tool, user, borrowed_at, is_overage) VALUES (?, ?, ?, ?, ?)')
      .run(borrow.id, borrow.poolName, borrow.holder, borrow.borrowedAt.toISOString(), borrow.isOverage ? 1 : 0);
  }

  async recordReturn(borrowId: string, returnedAt: Date): Promise<void> {
    this.db
      .prepare('UPDATE borrows SET returned_at = ? WHERE id = ? AND returned_at IS NULL')
      .run(returnedAt.toISOString(), borrowId);
  }

  async recordOverageCharge(charge: OverageCharge): Promise<void> {
    this.db
      .prepare(
        'INSERT INTO overage_charges(id, tool, borrow_id, user, charged_at, amount) VALUES (?, ?, ?, ?, ?, ?)'
      )
      .run(
        charge.id,
        charge.poolName,
        charge.borrowId,
        charge.holder,
        charge.chargedAt.toISOString(),
        charge.amount
      );
  }

  async listOutstanding(): Promise<Borrow[]> {
    const rows = this.db
      .prepare<[], BorrowRow>(
        `SELECT id, tool, user, borrowed_at, is_overage FROM borrows
         WHERE returned_at IS NULL ORDER BY borrowed_at ASC`
      )
      .all();

    return rows.map((row) => ({
      id: row.id,
      poolName: row.tool,
      holder: row.user,
      borrowedAt: new Date(row.borrowed_at),
      isOverage: row.is_overage === 1,
    }));
  }

  async listOverageCharges(poolName?: string): Promise<OverageCharge[]> {
    const rows = poolName
      ? this.db
          .prepare<[string], ChargeRow>(
            `SELECT id, tool, borrow_id, user, charged_at, amount FROM overage_charges
             WHERE tool = ? ORDER BY charged_at DESC`
          )
          .all(poolName)
      : this.db
          .prepare<[], ChargeRow>(
            `SELECT id, tool, borrow_id, user, charged_at, amount FROM overage_charges
             ORDER BY charged_at DESC`
          )
          .all();

    return rows.map((row) => ({
      id: row.id,
      poolName: row.tool,
      borrowId: row.borrow_id,
      holder: row.user,
      chargedAt: new Date(row.charged_at),
      amount: row.amount,
    }));
  }

  async overageTotals(): Promise<OverageTotals[]> {
    const rows = this.db
      .prepare<[], TotalsRow>(
        `SELECT p.tool AS tool,
                (SELECT COUNT(*) FROM borrows b WHERE b.tool = p.tool AND b.is_overage = 1) AS overage_borrows,
                (SELECT COALESCE(SUM(c.amount), 0) FROM overage_charges c WHERE c.tool = p.tool) AS accrued
         FROM pools p ORDER BY p.tool ASC`
      )
      .all();

    return rows.map((row) => ({
      poolName: row.tool,
      overageBorrows: row.overage_borrows,
      accruedOverageCost: row.accrued,
    }));
  }
}
