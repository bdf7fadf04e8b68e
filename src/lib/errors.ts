/**
 * TubeBrief — Error Taxonomy
 *
 * Every failure that crosses a component boundary is one of these classes.
 * Per-item failures are translated into them at the stage boundary and never
 * abort a cycle; PersistenceError and ConfigurationError are the fatal ones.
 */

import type { ProcessedRecord } from '../types';

export type ErrorCode =
  | 'transient_network'
  | 'rate_limited'
  | 'content_unavailable'
  | 'invalid_input'
  | 'permanent_source'
  | 'persistence_failure'
  | 'configuration_error'
  | 'not_found'
  | 'already_exists'
  | 'cycle_in_progress';

export class TubeBriefError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network failure or timeout. Retry with backoff, bounded. */
export class TransientNetworkError extends TubeBriefError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transient_network', message, options);
  }
}

/** Provider throttling (HTTP 429 and friends). */
export class RateLimitedError extends TubeBriefError {
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super('rate_limited', message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** The content does not exist (no captions). Permanent skip. */
export class ContentUnavailableError extends TubeBriefError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('content_unavailable', message, options);
  }
}

/** The request can never succeed as sent. Permanent skip. */
export class InvalidInputError extends TubeBriefError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invalid_input', message, options);
  }
}

/** Discovery cannot read this channel (unknown or malformed reference). */
export class PermanentSourceError extends TubeBriefError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('permanent_source', message, options);
  }
}

/** The registry or ledger store is unreachable or rejected a write. Fatal for the run. */
export class PersistenceError extends TubeBriefError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('persistence_failure', message, options);
  }
}

/**
 * A persistence failure that stopped a cycle after it had already written
 * records. Carries those records so the caller can still build a digest.
 */
export class CycleAbortedError extends PersistenceError {
  constructor(
    readonly runId: string,
    readonly records: ProcessedRecord[],
    cause: PersistenceError
  ) {
    super(cause.message, { cause });
  }
}

/** Invalid or missing configuration. Fatal before any cycle runs. */
export class ConfigurationError extends TubeBriefError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration_error', message, options);
  }
}

export class NotFoundError extends TubeBriefError {
  constructor(message: string) {
    super('not_found', message);
  }
}

/** Raised by a ledger store when a concurrent writer inserted the same video first. */
export class AlreadyExistsError extends TubeBriefError {
  constructor(message: string) {
    super('already_exists', message);
  }
}

export class CycleInProgressError extends TubeBriefError {
  constructor() {
    super('cycle_in_progress', 'A cycle is already running');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything a store throws into a PersistenceError, keeping taxonomy
 * errors (NotFound, AlreadyExists) as they are.
 */
export function toPersistenceError(operation: string, error: unknown): TubeBriefError {
  if (error instanceof TubeBriefError) return error;
  return new PersistenceError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
}
