/**
 * TubeBrief — Stage Outcome Classification Tests
 */

import { describe, it, expect } from 'vitest';
import { classifyStageError } from '../../src/stages/outcome';
import {
  ConfigurationError,
  ContentUnavailableError,
  InvalidInputError,
  NotFoundError,
  PermanentSourceError,
  RateLimitedError,
  TransientNetworkError,
} from '../../src/lib/errors';

describe('classifyStageError', () => {
  it('should treat missing content as unavailable', () => {
    expect(classifyStageError(new ContentUnavailableError('Captions disabled'))).toEqual({
      status: 'unavailable',
      detail: 'Captions disabled',
    });
  });

  it('should treat throttling, network and configuration errors as transient', () => {
    expect(classifyStageError(new RateLimitedError('429')).status).toBe('transient');
    expect(classifyStageError(new TransientNetworkError('ECONNRESET')).status).toBe('transient');
    expect(classifyStageError(new ConfigurationError('401 invalid key')).status).toBe('transient');
  });

  it('should treat rejected input as fatal', () => {
    expect(classifyStageError(new InvalidInputError('too long')).status).toBe('fatal');
    expect(classifyStageError(new PermanentSourceError('gone')).status).toBe('fatal');
    expect(classifyStageError(new NotFoundError('no such video')).status).toBe('fatal');
  });

  it('should wrap unknown errors as transient network errors', () => {
    const outcome = classifyStageError(new Error('boom'));

    expect(outcome.status).toBe('transient');
    if (outcome.status !== 'transient') return;
    expect(outcome.detail).toBe('boom');
    expect(outcome.error).toBeInstanceOf(TransientNetworkError);
  });

  it('should handle thrown non-errors', () => {
    expect(classifyStageError('plain string')).toMatchObject({
      status: 'transient',
      detail: 'plain string',
    });
  });
});
