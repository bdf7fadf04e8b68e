/**
 * TubeBrief — Type Exports
 */

export type { Source, StoredSource } from './source';

export type {
  DiscoveredVideo,
  VideoCandidate,
  SkipReason,
  RecordOutcome,
  ProcessedRecord,
} from './video';
export { DiscoveredVideoSchema } from './video';

export type {
  StageKind,
  CycleState,
  CycleStatus,
  DeferReason,
  SourceFailureReason,
  CycleIssue,
  WatermarkAdvance,
  CycleRun,
} from './cycle';
