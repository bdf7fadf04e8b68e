/**
 * TubeBrief — Candidate Selection & Watermark Targets
 *
 * Pure helpers used by the orchestrator's selecting and finalizing phases.
 */

import type { VideoCandidate } from '../types';

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Merge order for one cycle: oldest first across all sources, then source
 * registration order, then video id. The result is fully deterministic.
 */
export function sortCandidates(
  candidates: VideoCandidate[],
  sourceOrder: ReadonlyMap<string, number>
): VideoCandidate[] {
  const rank = (sourceId: string) => sourceOrder.get(sourceId) ?? Number.MAX_SAFE_INTEGER;

  return [...candidates].sort(
    (a, b) =>
      a.publishedAt.getTime() - b.publishedAt.getTime() ||
      rank(a.sourceId) - rank(b.sourceId) ||
      compareIds(a.videoId, b.videoId)
  );
}

/**
 * Per source, the latest publish time the watermark may move to.
 *
 * `resolved` holds candidates that reached a terminal outcome (summarized or
 * permanently skipped). `unresolved` holds everything this cycle saw but did
 * not finish: deferred after a transient failure, cut by the quota, or left
 * behind by cancellation. The target is the latest resolved time that is
 * strictly earlier than the source's earliest unresolved time, so the next
 * cycle still discovers every unresolved video.
 */
export function computeWatermarkTargets(
  resolved: VideoCandidate[],
  unresolved: VideoCandidate[]
): Map<string, Date> {
  const boundaries = new Map<string, number>();
  for (const candidate of unresolved) {
    const time = candidate.publishedAt.getTime();
    const current = boundaries.get(candidate.sourceId);
    if (current === undefined || time < current) {
      boundaries.set(candidate.sourceId, time);
    }
  }

  const targets = new Map<string, Date>();
  for (const candidate of resolved) {
    const time = candidate.publishedAt.getTime();
    const boundary = boundaries.get(candidate.sourceId);
    if (boundary !== undefined && time >= boundary) continue;

    const current = targets.get(candidate.sourceId);
    if (current === undefined || time > current.getTime()) {
      targets.set(candidate.sourceId, candidate.publishedAt);
    }
  }

  return targets;
}
