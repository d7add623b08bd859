import { randomUUID } from 'crypto';
import type { EngineLogger } from '../logger.js';
import { encodeSnapshot, type Snapshot } from './snapshot.js';
import {
  StreamSession,
  type CloseReason,
  type SessionState,
  type SessionTransport,
  type SnapshotFrame,
} from './stream-session.js';

export const DEFAULT_SESSION_QUEUE_DEPTH = 2;

export interface SessionManagerOptions {
  logger: EngineLogger;
  queueDepth?: number;
  generateId?: () => string;
}

export interface BroadcastResult {
  delivered: number;
  dropped: number;
}

export interface SessionInfo {
  id: string;
  state: SessionState;
  connectedAt: string;
  delivered: number;
  pending: number;
}

/**
 * The fan-out set of live observer sessions. Closed sessions remove
 * themselves; reconnecting is up to the client.
 */
export class SessionManager {
  private readonly sessions = new Map<string, StreamSession>();
  private readonly logger: EngineLogger;
  private readonly queueDepth: number;
  private readonly generateId: () => string;

  constructor(options: SessionManagerOptions) {
    this.logger = options.logger;
    this.queueDepth = options.queueDepth ?? DEFAULT_SESSION_QUEUE_DEPTH;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Register a new session. When `initial` is given it is queued right away,
   * so a fresh connection starts from a full snapshot.
   */
  subscribe(transport: SessionTransport, initial?: Snapshot): StreamSession {
    const session = new StreamSession(this.generateId(), transport, {
      queueDepth: this.queueDepth,
      logger: this.logger,
      onClosed: (closed, reason) => this.handleClosed(closed, reason),
    });
    this.sessions.set(session.id, session);
    session.open();
    this.logger.info({ sessionId: session.id, sessions: this.sessions.size }, 'stream session opened');

    if (initial) {
      session.offer(toFrame(initial));
    }
    return session;
  }

  unsubscribe(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    session.close('unsubscribe');
    return true;
  }

  /**
   * Offer the snapshot to every open session. A session that cannot take it
   * is closed and dropped; nothing here waits on a session's delivery.
   */
  broadcast(snapshot: Snapshot): BroadcastResult {
    const frame = toFrame(snapshot);
    const result: BroadcastResult = { delivered: 0, dropped: 0 };

    for (const session of [...this.sessions.values()]) {
      if (session.offer(frame)) {
        result.delivered++;
      } else {
        result.dropped++;
        session.close(session.status === 'closed' ? 'write_error' : 'slow_consumer');
        this.sessions.delete(session.id);
      }
    }
    return result;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  list(): SessionInfo[] {
    return [...this.sessions.values()].map((session) => ({
      id: session.id,
      state: session.status,
      connectedAt: session.connectedAt.toISOString(),
      delivered: session.delivered,
      pending: session.pending,
    }));
  }

  closeAll(reason: CloseReason = 'shutdown'): void {
    for (const session of [...this.sessions.values()]) {
      session.close(reason);
    }
    this.sessions.clear();
  }

  private handleClosed(session: StreamSession, reason: CloseReason): void {
    this.sessions.delete(session.id);
    this.logger.debug({ sessionId: session.id, reason, sessions: this.sessions.size }, 'session removed');
  }
}

function toFrame(snapshot: Snapshot): SnapshotFrame {
  return { tick: snapshot.tick, payload: encodeSnapshot(snapshot) };
}
