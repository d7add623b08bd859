import { Worker, Job } from 'bullmq';
import { getRedisConnection, QUEUE_NAMES } from './queue.js';
import type { LicenseHistoryJobData } from './queue.js';
import { createLicenseHistoryProcessor } from './processors/license-history.processor.js';
import type { LicenseHistoryResult } from './processors/license-history.processor.js';
import type { HistoryRepository } from '../repositories/history.repository.js';

let licenseHistoryWorker: Worker<LicenseHistoryJobData, LicenseHistoryResult> | null = null;

/**
 * Start all background job workers
 */
export async function startWorkers(repository: HistoryRepository): Promise<void> {
  console.log('Starting background job workers...');

  // License history worker; one job at a time keeps writes in enqueue order
  licenseHistoryWorker = new Worker<LicenseHistoryJobData, LicenseHistoryResult>(
    QUEUE_NAMES.LICENSE_HISTORY,
    createLicenseHistoryProcessor(repository),
    {
      connection: getRedisConnection(),
      concurrency: 1,
    }
  );

  licenseHistoryWorker.on('completed', (job: Job<LicenseHistoryJobData>, result: LicenseHistoryResult) => {
    console.log(`[license-history] Job ${job.id} completed: ${result.type}`);
  });

  licenseHistoryWorker.on('failed', (job: Job<LicenseHistoryJobData> | undefined, err: Error) => {
    console.error(`[license-history] Job ${job?.id} failed:`, err.message);
  });

  licenseHistoryWorker.on('error', (err: Error) => {
    console.error('[license-history] Worker error:', err.message);
  });

  console.log('All workers started successfully');
}

/**
 * Stop all workers gracefully
 */
export async function stopWorkers(): Promise<void> {
  console.log('Stopping background job workers...');

  if (licenseHistoryWorker) {
    const worker = licenseHistoryWorker;
    licenseHistoryWorker = null;
    await worker.close();
  }

  console.log('All workers stopped');
}

/**
 * Get worker status for health checks
 */
export function getWorkerStatus(): { licenseHistory: boolean } {
  return {
    licenseHistory: licenseHistoryWorker !== null && !licenseHistoryWorker.closing,
  };
}
