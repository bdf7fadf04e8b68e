/**
 * TubeBrief — Source Types
 *
 * A source is one monitored YouTube channel together with its watermark:
 * the publish time up to which every video has been resolved.
 */

/**
 * A source as the registry hands it to the orchestrator.
 * The watermark is always resolved (never null here).
 */
export interface Source {
  id: string;
  name: string;
  /** Channel id as understood by the discovery collaborator (UC...) */
  channelRef: string;
  watermark: Date;
}

/**
 * A source as persisted. A channel that has never completed a video has no
 * watermark yet.
 */
export interface StoredSource {
  id: string;
  name: string;
  channelRef: string;
  watermark: Date | null;
}
