/**
 * TubeBrief — Cycle Types
 */

import type { ProcessedRecord, SkipReason } from './video';

export type StageKind = 'transcript' | 'summarize';

export type CycleState = 'idle' | 'discovering' | 'selecting' | 'processing' | 'finalizing';

export type CycleStatus = 'completed' | 'cancelled';

export type DeferReason =
  | 'transcript_transient' // transcript call timed out or hit a network error
  | 'summarize_transient'  // LLM call failed transiently after the retry budget
  | 'rate_limited';        // LLM kept throttling after the retry budget

export type SourceFailureReason =
  | 'discovery_transient'
  | 'discovery_failed';

/**
 * One skipped, deferred or failed item, reported on the CycleRun.
 */
export type CycleIssue =
  | {
      disposition: 'skipped';
      reason: SkipReason;
      sourceId: string;
      videoId: string;
      title: string;
      detail?: string;
    }
  | {
      disposition: 'deferred';
      reason: DeferReason;
      sourceId: string;
      videoId: string;
      title: string;
      detail?: string;
    }
  | {
      disposition: 'source_failed';
      reason: SourceFailureReason;
      sourceId: string;
      detail: string;
    };

export interface WatermarkAdvance {
  sourceId: string;
  watermark: Date;
  /** False when the store already held a later watermark */
  moved: boolean;
}

/**
 * Summary of one cycle, returned to whoever triggered it.
 */
export interface CycleRun {
  runId: string;
  status: CycleStatus;
  startedAt: Date;
  finishedAt: Date;
  quota: number;
  quotaRemaining: number;
  discoveredCount: number;
  selectedCount: number;
  /** Candidates summarized and recorded */
  processedCount: number;
  /** Candidates permanently skipped and recorded */
  skippedCount: number;
  /** Candidates left for a later cycle after a transient failure */
  deferredCount: number;
  errors: CycleIssue[];
  /** Records newly created by this run, in processing order */
  records: ProcessedRecord[];
  watermarks: WatermarkAdvance[];
}
