// Queue exports
export {
  QUEUE_NAMES,
  getRedisConnection,
  closeQueues,
  enqueueLicenseHistory,
} from './queue.js';

export type { LicenseHistoryJobData, BorrowRecord, OverageChargeRecord } from './queue.js';

// Worker exports
export { startWorkers, stopWorkers, getWorkerStatus } from './worker.js';

// History sink
export { QueuedHistorySink } from './history-sink.js';

// Processor exports (for testing)
export { createLicenseHistoryProcessor } from './processors/license-history.processor.js';
