import type { FailureReason } from '../engine/ledger/types.js';

export class NotFoundError extends Error {
  public statusCode = 404;

  constructor(resource: string, id?: string) {
    super(id ? `${resource} with id '${id}' not found` : `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * The pool has no seat to hand out right now. Callers should retry later;
 * this is distinct from a generic failure.
 */
export class CapacityExceededError extends Error {
  public statusCode = 409;
  public readonly retryable = true;

  constructor(
    public readonly poolName: string,
    public readonly reason: Extract<FailureReason, 'exhausted' | 'max_overage'>
  ) {
    super(
      reason === 'max_overage'
        ? `No licenses available for ${poolName}: overage limit reached`
        : `No licenses available for ${poolName}`
    );
    this.name = 'CapacityExceededError';
  }
}

export class UnknownBorrowError extends Error {
  public statusCode = 404;

  constructor(public readonly borrowId: string) {
    super(`Borrow '${borrowId}' is not outstanding`);
    this.name = 'UnknownBorrowError';
  }
}

export class PoolInactiveError extends Error {
  public statusCode = 409;

  constructor(public readonly poolName: string) {
    super(`Pool '${poolName}' is deactivated`);
    this.name = 'PoolInactiveError';
  }
}

export class BufferAppendError extends Error {
  constructor(kind: string, cause: unknown) {
    super(`Failed to buffer ${kind} event`, { cause });
    this.name = 'BufferAppendError';
  }
}

export class SessionWriteError extends Error {
  constructor(sessionId: string, cause: unknown) {
    super(`Write to stream session ${sessionId} failed`, { cause });
    this.name = 'SessionWriteError';
  }
}
