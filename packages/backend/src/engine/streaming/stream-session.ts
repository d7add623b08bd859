import { SessionWriteError } from '../../lib/errors.js';
import type { EngineLogger } from '../logger.js';

export type SessionState = 'connecting' | 'open' | 'closed';

export type CloseReason =
  | 'client_disconnect'
  | 'write_error'
  | 'unsubscribe'
  | 'slow_consumer'
  | 'shutdown';

/** Byte pipe to one observer, e.g. an SSE response. */
export interface SessionTransport {
  /** Resolves once the frame is handed to the connection; rejects on write failure. */
  send(payload: string): Promise<void>;
  close(): void;
  /** Registers a callback for a disconnect initiated by the client. */
  onClose(listener: () => void): void;
}

/** A snapshot serialized once per tick, shared by all sessions. */
export interface SnapshotFrame {
  tick: number;
  payload: string;
}

export interface StreamSessionOptions {
  /** Frames that may wait for delivery before the session counts as slow. */
  queueDepth: number;
  logger: EngineLogger;
  onClosed: (session: StreamSession, reason: CloseReason) => void;
  now?: () => Date;
}

/**
 * One observer's live connection. Frames are offered by the publisher and
 * drained by the session's own delivery loop, one at a time and in tick
 * order.
 */
export class StreamSession {
  readonly connectedAt: Date;
  private state: SessionState = 'connecting';
  private readonly queue: SnapshotFrame[] = [];
  private draining = false;
  private lastTick = -1;
  private deliveredCount = 0;

  constructor(
    readonly id: string,
    private readonly transport: SessionTransport,
    private readonly options: StreamSessionOptions
  ) {
    this.connectedAt = (options.now ?? (() => new Date()))();
  }

  get status(): SessionState {
    return this.state;
  }

  get delivered(): number {
    return this.deliveredCount;
  }

  get pending(): number {
    return this.queue.length;
  }

  open(): void {
    if (this.state !== 'connecting') {
      return;
    }
    this.transport.onClose(() => this.close('client_disconnect'));
    this.state = 'open';
  }

  /**
   * Queue a frame without waiting for delivery. Returns false when the
   * session cannot take it: closed, or its queue is already full.
   * Frames from a tick the session has already seen are ignored.
   */
  offer(frame: SnapshotFrame): boolean {
    if (this.state !== 'open') {
      return false;
    }
    if (frame.tick <= this.lastTick) {
      return true;
    }
    if (this.queue.length >= this.options.queueDepth) {
      return false;
    }
    this.queue.push(frame);
    this.lastTick = frame.tick;
    void this.drain();
    return true;
  }

  close(reason: CloseReason, cause?: unknown): void {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    this.queue.length = 0;
    try {
      this.transport.close();
    } catch (err) {
      this.options.logger.debug({ err, sessionId: this.id }, 'transport close failed');
    }

    const log = reason === 'write_error' || reason === 'slow_consumer' ? 'warn' : 'info';
    this.options.logger[log](
      { sessionId: this.id, reason, delivered: this.deliveredCount, err: cause },
      'stream session closed'
    );
    this.options.onClosed(this, reason);
  }

  private async drain(): Promise<void> {
    if (this.draining) {
      return;
    }
    this.draining = true;
    try {
      let frame = this.queue.shift();
      while (frame && this.state === 'open') {
        await this.transport.send(frame.payload);
        this.deliveredCount += 1;
        frame = this.queue.shift();
      }
    } catch (err) {
      this.close('write_error', new SessionWriteError(this.id, err));
    } finally {
      this.draining = false;
    }
  }
}
