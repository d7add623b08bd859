import { Queue } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import { getConfig } from '../lib/config/index.js';
import type { StoredPool } from '../engine/ledger/types.js';

// Queue names
export const QUEUE_NAMES = {
  LICENSE_HISTORY: 'license-history',
} as const;

// Job data types
export interface BorrowRecord {
  id: string;
  poolName: string;
  holder: string;
  borrowedAt: string;
  isOverage: boolean;
}

export interface OverageChargeRecord {
  id: string;
  poolName: string;
  borrowId: string;
  holder: string;
  chargedAt: string;
  amount: number;
}

export type LicenseHistoryJobData =
  | { type: 'pool_saved'; pool: StoredPool }
  | { type: 'borrowed'; borrow: BorrowRecord; charge?: OverageChargeRecord }
  | { type: 'returned'; borrowId: string; returnedAt: string };

/**
 * Redis connection options for BullMQ, from the validated config.
 */
export function getRedisConnection(): ConnectionOptions {
  const { redis } = getConfig();
  return {
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
  };
}

// Queue instances (lazy initialization)
let licenseHistoryQueue: Queue<LicenseHistoryJobData> | null = null;

/**
 * Get or create the license history queue
 */
function getLicenseHistoryQueue(): Queue<LicenseHistoryJobData> {
  if (!licenseHistoryQueue) {
    licenseHistoryQueue = new Queue<LicenseHistoryJobData>(QUEUE_NAMES.LICENSE_HISTORY, {
      connection: getRedisConnection(),
      defaultJobOptions: {
        attempts: 5,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: {
          age: 24 * 3600, // Keep completed jobs for 24 hours
          count: 1000,
        },
        removeOnFail: {
          age: 7 * 24 * 3600, // Keep failed jobs for 7 days
        },
      },
    });
  }
  return licenseHistoryQueue;
}

/**
 * Close all queue connections
 */
export async function closeQueues(): Promise<void> {
  if (licenseHistoryQueue) {
    const queue = licenseHistoryQueue;
    licenseHistoryQueue = null;
    await queue.close();
  }
}

/**
 * Job ID for a history entry. Borrow and return entries are keyed by borrow
 * so a retried enqueue does not write twice.
 */
export function historyJobId(data: LicenseHistoryJobData): string | undefined {
  switch (data.type) {
    case 'borrowed':
      return `borrowed-${data.borrow.id}`;
    case 'returned':
      return `returned-${data.borrowId}`;
    default:
      return undefined;
  }
}

/**
 * Helper to add a license history job
 */
export async function enqueueLicenseHistory(data: LicenseHistoryJobData): Promise<string | null> {
  const queue = getLicenseHistoryQueue();
  const job = await queue.add(data.type, data, { jobId: historyJobId(data) });
  return job.id ?? null;
}
