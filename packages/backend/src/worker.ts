/**
 * Standalone worker process for background jobs
 *
 * Run with: npm run worker
 */
import 'dotenv/config';
import { startWorkers, stopWorkers, closeQueues } from './jobs/index.js';
import { getConfig } from './lib/config/index.js';
import { openDatabase } from './lib/db.js';
import { SqliteHistoryRepository } from './repositories/history.repository.js';

async function main() {
  console.log('Seat Pool History Worker');
  console.log('========================');

  const config = getConfig();
  const db = openDatabase(config.database.path);

  // Start workers
  await startWorkers(new SqliteHistoryRepository(db));

  // Graceful shutdown handling
  const shutdown = async (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    try {
      await stopWorkers();
      await closeQueues();
      db.close();
      console.log('Shutdown complete');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Keep the process running
  console.log('\nWorker is running. Press Ctrl+C to stop.\n');
}

main().catch((error) => {
  console.error('Failed to start worker:', error);
  process.exit(1);
});
