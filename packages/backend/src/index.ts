import 'dotenv/config';
import { buildApp } from './app.js';
import { createLicenseCore, hydrateFromRepository } from './core.js';
import type { HistorySink } from './engine/ledger/types.js';
import { getConfig } from './lib/config/index.js';
import { loadPoolSeeds } from './lib/config/pools.js';
import { openDatabase } from './lib/db.js';
import { SqliteHistoryRepository } from './repositories/history.repository.js';
import { DirectHistorySink } from './services/history-sink.js';
import { QueuedHistorySink, enqueueLicenseHistory, closeQueues } from './jobs/index.js';

const config = getConfig();
const db = openDatabase(config.database.path);
const repository = new SqliteHistoryRepository(db);

const seeds = config.database.seed ? await loadPoolSeeds(config.database.seedFile) : [];
const hydrated = await hydrateFromRepository(repository, seeds);

const history: HistorySink =
  config.history.mode === 'queue'
    ? new QueuedHistorySink(enqueueLicenseHistory)
    : new DirectHistorySink(repository);

const fastify = await buildApp({
  frontendUrl: config.frontendUrl,
  appVersion: config.appVersion,
  historyMode: config.history.mode,
  repository,
  createCore: (loggerFor) =>
    createLicenseCore({
      pools: hydrated.pools,
      loggerFor,
      history,
      telemetry: config.telemetry,
    }),
});

const restored = fastify.licenseCore.ledger.restoreBorrows(hydrated.outstanding);
fastify.log.info(
  { pools: hydrated.pools.length, seeded: hydrated.seeded, restoredBorrows: restored, history: config.history.mode },
  'license ledger ready'
);

fastify.addHook('onClose', async () => {
  if (config.history.mode === 'queue') {
    await closeQueues();
  }
  db.close();
});

const shutdown = async (signal: string) => {
  fastify.log.info(`Received ${signal}, shutting down`);
  try {
    await fastify.close();
    process.exit(0);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
