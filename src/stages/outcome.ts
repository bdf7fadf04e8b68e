/**
 * TubeBrief — Stage Outcomes
 *
 * Every stage call resolves to exactly one of four outcomes. Exceptions
 * never leave a stage wrapper; they are classified here.
 */

import {
  ConfigurationError,
  ContentUnavailableError,
  InvalidInputError,
  PermanentSourceError,
  RateLimitedError,
  TransientNetworkError,
  TubeBriefError,
  errorMessage,
} from '../lib/errors';

export type StageOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'unavailable'; detail: string }
  | { status: 'transient'; detail: string; error: TubeBriefError }
  | { status: 'fatal'; detail: string; error: TubeBriefError };

export type FailedOutcome = Exclude<StageOutcome<never>, { status: 'success' }>;

/**
 * Map a thrown value onto the outcome taxonomy.
 *
 * - throttling, network errors and timeouts are transient
 * - missing content is unavailable
 * - rejected input is fatal
 * - configuration errors are transient: a bad key must not permanently skip videos
 * - anything unrecognised is transient, so it is retried in a later cycle
 */
export function classifyStageError(error: unknown): FailedOutcome {
  const detail = errorMessage(error);

  if (error instanceof ContentUnavailableError) {
    return { status: 'unavailable', detail };
  }
  if (error instanceof InvalidInputError || error instanceof PermanentSourceError) {
    return { status: 'fatal', detail, error };
  }
  if (
    error instanceof RateLimitedError ||
    error instanceof TransientNetworkError ||
    error instanceof ConfigurationError
  ) {
    return { status: 'transient', detail, error };
  }
  if (error instanceof TubeBriefError) {
    return { status: 'fatal', detail, error };
  }

  return {
    status: 'transient',
    detail,
    error: new TransientNetworkError(detail, { cause: error }),
  };
}
