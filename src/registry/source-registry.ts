/**
 * TubeBrief — Source Registry
 *
 * Lists the monitored channels in registration order and owns their
 * watermarks. A watermark only ever moves forward: the store applies
 * max(current, proposed) with a compare-and-set, so concurrent writers can
 * never pull it back.
 */

import { toPersistenceError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { Source, StoredSource } from '../types';

/**
 * Persistence contract for sources.
 */
export interface SourceStore {
  /** Active sources in registration order */
  listActive(): Promise<StoredSource[]>;
  /** Throws NotFoundError when the source is unknown */
  getWatermark(sourceId: string): Promise<Date | null>;
  /**
   * Set watermark := max(watermark, ts) atomically.
   * Returns whether the stored value changed. Throws NotFoundError when unknown.
   */
  setWatermark(sourceId: string, ts: Date): Promise<boolean>;
}

export interface SourceRegistryOptions {
  /** Lookback applied to sources that have never been advanced */
  initialLookbackHours?: number;
  clock?: () => Date;
}

export class SourceRegistry {
  private readonly initialLookbackMs: number;
  private readonly clock: () => Date;
  private readonly logger = logger.child({ component: 'source-registry' });

  constructor(
    private readonly store: SourceStore,
    options: SourceRegistryOptions = {}
  ) {
    this.initialLookbackMs = (options.initialLookbackHours ?? 24) * 60 * 60 * 1000;
    this.clock = options.clock ?? (() => new Date());
  }

  async listActiveSources(): Promise<Source[]> {
    let stored: StoredSource[];
    try {
      stored = await this.store.listActive();
    } catch (error) {
      throw toPersistenceError('List active sources', error);
    }

    return stored.map(source => ({
      id: source.id,
      name: source.name,
      channelRef: source.channelRef,
      watermark: this.resolveWatermark(source.watermark),
    }));
  }

  async getWatermark(sourceId: string): Promise<Date> {
    try {
      return this.resolveWatermark(await this.store.getWatermark(sourceId));
    } catch (error) {
      throw toPersistenceError(`Read watermark of ${sourceId}`, error);
    }
  }

  /**
   * Move a source's watermark forward to `ts` if it is later than the
   * stored value. Returns whether anything changed.
   */
  async advanceWatermark(sourceId: string, ts: Date): Promise<boolean> {
    let moved: boolean;
    try {
      moved = await this.store.setWatermark(sourceId, ts);
    } catch (error) {
      throw toPersistenceError(`Advance watermark of ${sourceId}`, error);
    }

    if (moved) {
      this.logger.info('Watermark advanced', { sourceId, watermark: ts.toISOString() });
    } else {
      this.logger.debug('Watermark already at or past target', {
        sourceId,
        target: ts.toISOString(),
      });
    }

    return moved;
  }

  private resolveWatermark(watermark: Date | null): Date {
    return watermark ?? new Date(this.clock().getTime() - this.initialLookbackMs);
  }
}
