import { PoolLedger } from './engine/ledger/pool-ledger.js';
import type { Borrow, HistorySink, PoolConfig, PoolSeed } from './engine/ledger/types.js';
import type { EngineLogger } from './engine/logger.js';
import { SessionManager } from './engine/streaming/session-manager.js';
import { SnapshotPublisher } from './engine/streaming/snapshot-publisher.js';
import { EventBuffer } from './engine/telemetry/event-buffer.js';
import { RateAggregator } from './engine/telemetry/rate-aggregator.js';
import { LicenseMetrics } from './lib/metrics.js';
import type { HistoryRepository } from './repositories/history.repository.js';

export interface TelemetrySettings {
  snapshotIntervalMs?: number;
  retentionMs?: number;
  maxEventsPerCategory?: number;
  recentEventsMs?: number;
  sessionQueueDepth?: number;
}

export interface LicenseCoreOptions {
  pools: readonly PoolSeed[];
  loggerFor: (module: string) => EngineLogger;
  history?: HistorySink;
  metrics?: LicenseMetrics;
  telemetry?: TelemetrySettings;
  now?: () => Date;
}

/** The in-process engine: ledger, telemetry and the stream fan-out. */
export interface LicenseCore {
  ledger: PoolLedger;
  events: EventBuffer;
  rates: RateAggregator;
  sessions: SessionManager;
  publisher: SnapshotPublisher;
  metrics: LicenseMetrics;
}

export function createLicenseCore(options: LicenseCoreOptions): LicenseCore {
  const { loggerFor, telemetry = {} } = options;
  const now = options.now ?? (() => new Date());
  const nowMs = () => now().getTime();
  const metrics = options.metrics ?? new LicenseMetrics();

  const events = new EventBuffer({
    logger: loggerFor('event-buffer'),
    retentionMs: telemetry.retentionMs,
    maxEventsPerCategory: telemetry.maxEventsPerCategory,
    now: nowMs,
  });
  const ledger = new PoolLedger(options.pools, {
    events,
    logger: loggerFor('ledger'),
    history: options.history,
    metrics,
    now,
  });
  const rates = new RateAggregator(events, nowMs);
  const sessions = new SessionManager({
    logger: loggerFor('sessions'),
    queueDepth: telemetry.sessionQueueDepth,
  });
  const publisher = new SnapshotPublisher({
    ledger,
    events,
    rates,
    sessions,
    logger: loggerFor('publisher'),
    intervalMs: telemetry.snapshotIntervalMs,
    recentEventsMs: telemetry.recentEventsMs,
    now,
  });

  return { ledger, events, rates, sessions, publisher, metrics };
}

export interface HydratedState {
  pools: PoolSeed[];
  outstanding: Borrow[];
  seeded: string[];
}

/**
 * Rebuild ledger input from the store. Seed pools missing from the store are
 * saved first; pools already stored keep their stored configuration.
 */
export async function hydrateFromRepository(
  repository: HistoryRepository,
  seeds: readonly PoolConfig[]
): Promise<HydratedState> {
  const stored = await repository.loadPools();
  const known = new Set(stored.map((pool) => pool.name));
  const seeded: string[] = [];

  for (const seed of seeds) {
    if (known.has(seed.name)) {
      continue;
    }
    const pool = { ...seed, active: true };
    await repository.savePool(pool);
    stored.push(pool);
    known.add(seed.name);
    seeded.push(seed.name);
  }

  const totals = new Map((await repository.overageTotals()).map((row) => [row.poolName, row]));
  const pools = stored.map((pool) => ({
    ...pool,
    accruedOverageCost: totals.get(pool.name)?.accruedOverageCost ?? 0,
    overageBorrows: totals.get(pool.name)?.overageBorrows ?? 0,
  }));

  return { pools, outstanding: await repository.listOutstanding(), seeded };
}
