import type { PoolStatus } from '../ledger/types.js';
import type { EngineLogger } from '../logger.js';
import type { RateAggregator } from '../telemetry/rate-aggregator.js';
import type { EventSource, MinuteBucket } from '../telemetry/types.js';
import type { BroadcastResult } from './session-manager.js';
import type { Snapshot } from './snapshot.js';

export const DEFAULT_SNAPSHOT_INTERVAL_MS = 1000;
export const DEFAULT_RECENT_EVENTS_MS = 10_000;

export type PublisherState = 'idle' | 'composing' | 'broadcasting';

export type TickOutcome = 'published' | 'skipped' | 'failed';

/** What the publisher needs from the ledger: per-pool consistent reads. */
export interface LedgerReader {
  statusAll(): Promise<PoolStatus[]>;
}

export interface SnapshotBroadcaster {
  broadcast(snapshot: Snapshot): BroadcastResult;
}

export interface SnapshotPublisherOptions {
  ledger: LedgerReader;
  events: EventSource;
  rates: RateAggregator;
  sessions: SnapshotBroadcaster;
  logger: EngineLogger;
  intervalMs?: number;
  /** Lookback for `recent_events`. */
  recentEventsMs?: number;
  now?: () => Date;
}

export interface PublisherStats {
  state: PublisherState;
  running: boolean;
  tick: number;
  published: number;
  skipped: number;
  failed: number;
  lastPublishedAt: string | null;
}

/**
 * Drives the Idle → Composing → Broadcasting → Idle cycle on a fixed timer.
 * Only one cycle runs at a time; a tick that finds a cycle in progress is
 * skipped rather than queued.
 */
export class SnapshotPublisher {
  private state: PublisherState = 'idle';
  private timer: ReturnType<typeof setInterval> | null = null;
  private sequence = 0;
  private last: Snapshot | undefined;
  private counters = { published: 0, skipped: 0, failed: 0 };

  private readonly intervalMs: number;
  private readonly recentEventsMs: number;
  private readonly now: () => Date;

  constructor(private readonly options: SnapshotPublisherOptions) {
    this.intervalMs = options.intervalMs ?? DEFAULT_SNAPSHOT_INTERVAL_MS;
    this.recentEventsMs = options.recentEventsMs ?? DEFAULT_RECENT_EVENTS_MS;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref?.();
    this.options.logger.info({ intervalMs: this.intervalMs }, 'snapshot publisher started');
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.options.logger.info({ tick: this.sequence }, 'snapshot publisher stopped');
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get currentState(): PublisherState {
    return this.state;
  }

  /** Most recently broadcast snapshot, if any. */
  latest(): Snapshot | undefined {
    return this.last;
  }

  async tick(): Promise<TickOutcome> {
    if (this.state !== 'idle') {
      this.counters.skipped++;
      this.options.logger.debug({ state: this.state, tick: this.sequence }, 'tick skipped: cycle in progress');
      return 'skipped';
    }

    try {
      this.state = 'composing';
      const snapshot = await this.compose(this.sequence + 1);

      this.state = 'broadcasting';
      const result = this.options.sessions.broadcast(snapshot);
      this.sequence = snapshot.tick;
      this.last = snapshot;
      this.counters.published++;

      if (result.dropped > 0) {
        this.options.logger.warn({ tick: snapshot.tick, ...result }, 'dropped stream sessions');
      }
      return 'published';
    } catch (err) {
      this.counters.failed++;
      this.options.logger.error({ err, tick: this.sequence + 1 }, 'snapshot cycle failed');
      return 'failed';
    } finally {
      this.state = 'idle';
    }
  }

  /**
   * Build a snapshot from the ledger and the event buffer. Without a tick
   * number it is stamped with the last published tick, so ad-hoc reads never
   * run ahead of the stream.
   */
  async compose(tick = this.sequence): Promise<Snapshot> {
    const { ledger, events, rates } = this.options;

    const pools = await ledger.statusAll();
    const generatedAt = this.now();

    events.prune();
    const series: Record<string, readonly MinuteBucket[]> = {};
    for (const pool of pools) {
      series[pool.name] = events.seriesFor(pool.name);
    }

    return Object.freeze({
      tick,
      generatedAt,
      pools: Object.freeze(pools),
      rates: rates.rates(),
      recentBorrows: events.recent('borrow', generatedAt.getTime() - this.recentEventsMs),
      series: Object.freeze(series),
      bufferStats: { totalEvents: events.stats().totalEvents },
    });
  }

  stats(): PublisherStats {
    return {
      state: this.state,
      running: this.running,
      tick: this.sequence,
      ...this.counters,
      lastPublishedAt: this.last ? this.last.generatedAt.toISOString() : null,
    };
  }
}
