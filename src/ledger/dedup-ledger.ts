/**
 * TubeBrief — Dedup Ledger
 *
 * Durable set of videos that have already been turned into a
 * ProcessedRecord. The backing store enforces uniqueness on videoId; losing
 * an insert race is reported as AlreadyExistsError and counts as success
 * here, so replaying a video after a crash never produces a second record.
 */

import { AlreadyExistsError, toPersistenceError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { ProcessedRecord } from '../types';

/**
 * Persistence contract for processed records.
 */
export interface LedgerStore {
  exists(videoId: string): Promise<boolean>;
  /** Unique on videoId; throws AlreadyExistsError when the id is taken */
  insert(record: ProcessedRecord): Promise<void>;
  /** Latest records by processedAt, newest first */
  listRecent(limit: number): Promise<ProcessedRecord[]>;
}

export interface MarkResult {
  /** False when another writer recorded the video first */
  inserted: boolean;
}

export class DedupLedger {
  private readonly logger = logger.child({ component: 'dedup-ledger' });

  constructor(private readonly store: LedgerStore) {}

  async hasProcessed(videoId: string): Promise<boolean> {
    try {
      return await this.store.exists(videoId);
    } catch (error) {
      throw toPersistenceError(`Check ledger for ${videoId}`, error);
    }
  }

  async markProcessed(record: ProcessedRecord): Promise<MarkResult> {
    try {
      await this.store.insert(record);
    } catch (error) {
      if (error instanceof AlreadyExistsError) {
        this.logger.warn('Video already recorded by another writer', { videoId: record.videoId });
        return { inserted: false };
      }
      throw toPersistenceError(`Record ${record.videoId}`, error);
    }

    this.logger.debug('Video recorded', {
      videoId: record.videoId,
      outcome: record.outcome.kind,
    });
    return { inserted: true };
  }

  async listRecent(limit = 20): Promise<ProcessedRecord[]> {
    try {
      return await this.store.listRecent(limit);
    } catch (error) {
      throw toPersistenceError('List recent records', error);
    }
  }
}
