/**
 * TubeBrief — Video Types
 *
 * Candidates are produced by discovery and live for one cycle.
 * Processed records are written once per video and never change.
 */

import { z } from 'zod';

// ============================================================
// DISCOVERY
// ============================================================

export const DiscoveredVideoSchema = z.object({
  videoId: z.string().min(1),
  title: z.string(),
  publishedAt: z.date(),
  link: z.string().url(),
});
export type DiscoveredVideo = z.infer<typeof DiscoveredVideoSchema>;

export interface VideoCandidate extends DiscoveredVideo {
  sourceId: string;
}

// ============================================================
// PROCESSED RECORDS
// ============================================================

export type SkipReason =
  | 'no_transcript'        // captions do not exist
  | 'transcript_failed'    // transcript call failed permanently
  | 'summarization_failed'; // LLM rejected the input or failed permanently

export type RecordOutcome =
  | { kind: 'summarized'; summary: string }
  | { kind: 'skipped'; skipReason: SkipReason };

export interface ProcessedRecord {
  videoId: string;
  sourceId: string;
  title: string;
  link: string;
  outcome: RecordOutcome;
  publishedAt: Date;
  processedAt: Date;
}
