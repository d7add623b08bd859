import type {
  Borrow,
  HistorySink,
  OverageCharge,
  ReturnedBorrow,
  StoredPool,
} from '../engine/ledger/types.js';
import type { LicenseHistoryJobData } from './queue.js';

export type EnqueueHistory = (data: LicenseHistoryJobData) => Promise<unknown>;

/**
 * Hands ledger transitions to the license history queue; a worker process
 * writes them to the store.
 */
export class QueuedHistorySink implements HistorySink {
  constructor(private readonly enqueue: EnqueueHistory) {}

  async poolSaved(pool: StoredPool): Promise<void> {
    await this.enqueue({ type: 'pool_saved', pool: { ...pool } });
  }

  async borrowed(borrow: Borrow, charge?: OverageCharge): Promise<void> {
    await this.enqueue({
      type: 'borrowed',
      borrow: {
        id: borrow.id,
        poolName: borrow.poolName,
        holder: borrow.holder,
        borrowedAt: borrow.borrowedAt.toISOString(),
        isOverage: borrow.isOverage,
      },
      charge: charge && { ...charge, chargedAt: charge.chargedAt.toISOString() },
    });
  }

  async returned(borrow: ReturnedBorrow): Promise<void> {
    await this.enqueue({
      type: 'returned',
      borrowId: borrow.id,
      returnedAt: borrow.returnedAt.toISOString(),
    });
  }
}
