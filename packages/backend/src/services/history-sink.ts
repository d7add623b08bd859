import type {
  Borrow,
  HistorySink,
  OverageCharge,
  ReturnedBorrow,
  StoredPool,
} from '../engine/ledger/types.js';
import type { HistoryRepository } from '../repositories/history.repository.js';

/** Writes ledger transitions straight to the repository, in-process. */
export class DirectHistorySink implements HistorySink {
  constructor(private readonly repository: HistoryRepository) {}

  async poolSaved(pool: StoredPool): Promise<void> {
    await this.repository.savePool(pool);
  }

  async borrowed(borrow: Borrow, charge?: OverageCharge): Promise<void> {
    await this.repository.recordBorrow(borrow);
    if (charge) {
      await this.repository.recordOverageCharge(charge);
    }
  }

  async returned(borrow: ReturnedBorrow): Promise<void> {
    await this.repository.recordReturn(borrow.id, borrow.returnedAt);
  }
}
