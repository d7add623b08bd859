// ============================================================================
// Pool Ledger — Types
// ============================================================================

/** Provisioned shape of a pool: capacity split and prices. */
export interface PoolConfig {
  name: string;
  totalCapacity: number;
  /** Seats covered by the fixed commit fee. */
  commitQuantity: number;
  /** Seats allowed beyond the commit; total − commit by convention. */
  maxOverage: number;
  commitFee: number;
  overageUnitPrice: number;
}

/** Pool configuration together with counters restored from the store. */
export interface PoolSeed extends PoolConfig {
  active?: boolean;
  accruedOverageCost?: number;
  overageBorrows?: number;
}

export interface PoolState extends PoolConfig {
  borrowedCount: number;
  /** Never decreases, returns included. */
  accruedOverageCost: number;
  overageBorrows: number;
  active: boolean;
}

export interface Borrow {
  readonly id: string;
  readonly poolName: string;
  readonly holder: string;
  readonly borrowedAt: Date;
  /** Fixed at allocation time. */
  readonly isOverage: boolean;
  readonly returnedAt?: Date;
}

export type ReturnedBorrow = Borrow & { readonly returnedAt: Date };

export interface BorrowResult {
  borrowId: string;
  poolName: string;
  holder: string;
  borrowedAt: Date;
  isOverage: boolean;
}

export interface OverageCharge {
  id: string;
  poolName: string;
  borrowId: string;
  holder: string;
  chargedAt: Date;
  amount: number;
}

export interface PoolStatus {
  name: string;
  total: number;
  borrowed: number;
  available: number;
  commit: number;
  maxOverage: number;
  /** max(0, borrowed − commit) */
  overage: number;
  inCommit: boolean;
  commitFee: number;
  overageUnitPrice: number;
  overageBorrows: number;
  accruedOverageCost: number;
  totalCost: number;
  active: boolean;
}

export type FailureReason = 'exhausted' | 'max_overage' | 'unknown_tool' | 'inactive';

export type AllocationOutcome =
  | { ok: true; borrow: Borrow; charge?: OverageCharge }
  | { ok: false; reason: FailureReason; isOverage: boolean };

/** Pool configuration as persisted by the store. */
export interface StoredPool extends PoolConfig {
  active: boolean;
}

/**
 * Where ledger transitions go once they have committed in memory. Called
 * outside the pool's exclusive section; a failure here never rolls back the
 * transition.
 */
export interface HistorySink {
  poolSaved(pool: StoredPool): Promise<void>;
  borrowed(borrow: Borrow, charge?: OverageCharge): Promise<void>;
  returned(borrow: ReturnedBorrow): Promise<void>;
}

/** Counters and gauges the ledger reports to. Durations are in seconds. */
export interface LedgerMetrics {
  borrowAttempted(poolName: string, holder: string): void;
  borrowSucceeded(poolName: string, holder: string, isOverage: boolean, durationSeconds: number): void;
  borrowFailed(poolName: string, reason: FailureReason, durationSeconds: number): void;
  poolChanged(status: PoolStatus): void;
}
