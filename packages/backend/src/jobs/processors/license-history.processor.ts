import type { Job } from 'bullmq';
import type { LicenseHistoryJobData } from '../queue.js';
import type { HistoryRepository } from '../../repositories/history.repository.js';

export interface LicenseHistoryResult {
  type: LicenseHistoryJobData['type'];
}

export type LicenseHistoryJob = Pick<Job<LicenseHistoryJobData>, 'id' | 'data'>;

/**
 * Build the processor that applies queued ledger transitions to the store.
 * Jobs arrive in enqueue order; the worker runs them one at a time.
 */
export function createLicenseHistoryProcessor(repository: HistoryRepository) {
  return async function processLicenseHistory(job: LicenseHistoryJob): Promise<LicenseHistoryResult> {
    const { data } = job;

    switch (data.type) {
      case 'pool_saved':
        await repository.savePool(data.pool);
        console.log(`[license-history] Saved pool ${data.pool.name} (job ${job.id})`);
        break;
      case 'borrowed':
        await repository.recordBorrow({
          id: data.borrow.id,
          poolName: data.borrow.poolName,
          holder: data.borrow.holder,
          borrowedAt: new Date(data.borrow.borrowedAt),
          isOverage: data.borrow.isOverage,
        });
        if (data.charge) {
          await repository.recordOverageCharge({
            ...data.charge,
            chargedAt: new Date(data.charge.chargedAt),
          });
        }
        break;
      case 'returned':
        await repository.recordReturn(data.borrowId, new Date(data.returnedAt));
        break;
    }

    return { type: data.type };
  };
}
