/**
 * TubeBrief — Feed Orchestrator
 *
 * Runs one polling cycle:
 * 1. Discovering — ask discovery for each source's videos since its watermark,
 *    drop anything at or before the watermark or already in the ledger
 * 2. Selecting   — merge oldest-first across sources, admit up to the run quota
 * 3. Processing  — one candidate at a time: transcript, then summarization,
 *    each call paced by the rate governor
 * 4. Finalizing  — advance each source's watermark past what was resolved
 *
 * Processing is strictly sequential. The governor's pacing is what keeps the
 * metered providers within their abuse thresholds; candidates must not be
 * processed in parallel.
 *
 * Per-item failures are recorded on the CycleRun and never raised. Only
 * PersistenceError (registry or ledger unavailable) aborts the run. A failure
 * while processing leaves every watermark where it was; records written before
 * it are carried on a CycleAbortedError.
 */

import { nanoid } from 'nanoid';
import {
  CycleAbortedError,
  CycleInProgressError,
  PermanentSourceError,
  PersistenceError,
  errorMessage,
} from '../lib/errors';
import { logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import type { DedupLedger } from '../ledger/dedup-ledger';
import type { RateGovernor } from '../governor/rate-governor';
import type { SourceRegistry } from '../registry/source-registry';
import type { TranscriptStage } from '../stages/transcript-stage';
import type { SummarizationStage } from '../stages/summarization-stage';
import type { FailedOutcome } from '../stages/outcome';
import {
  DiscoveredVideoSchema,
  type CycleIssue,
  type CycleRun,
  type CycleState,
  type CycleStatus,
  type DeferReason,
  type DiscoveredVideo,
  type ProcessedRecord,
  type RecordOutcome,
  type Source,
  type VideoCandidate,
  type WatermarkAdvance,
} from '../types';
import { computeWatermarkTargets, sortCandidates } from './selection';

// ============================================================
// TYPES
// ============================================================

/**
 * Finds a channel's videos published after `since`.
 * Throws TransientNetworkError or PermanentSourceError.
 */
export interface DiscoveryClient {
  discover(channelRef: string, since: Date): Promise<DiscoveredVideo[]>;
}

export interface FeedOrchestratorDeps {
  registry: SourceRegistry;
  ledger: DedupLedger;
  governor: RateGovernor;
  discovery: DiscoveryClient;
  transcripts: TranscriptStage;
  summarization: SummarizationStage;
}

export interface FeedOrchestratorOptions {
  /** Default quota per run */
  quota: number;
  maxLines: number;
  /** Summarization retries after the first attempt */
  summarizeRetryBudget: number;
  /** Timeout for one discovery call */
  discoveryTimeoutMs?: number;
  clock?: () => Date;
  generateRunId?: () => string;
}

export interface RunCycleOptions {
  /** Override the configured quota for this run */
  quota?: number;
}

interface CycleContext {
  runId: string;
  startedAt: Date;
  quota: number;
  status: CycleStatus;
  discoveredCount: number;
  selectedCount: number;
  processedCount: number;
  skippedCount: number;
  deferredCount: number;
  errors: CycleIssue[];
  records: ProcessedRecord[];
  /** Candidates that reached a terminal outcome */
  resolved: VideoCandidate[];
  /** Candidates seen but not finished this cycle */
  unresolved: VideoCandidate[];
  watermarks: WatermarkAdvance[];
}

// ============================================================
// ORCHESTRATOR
// ============================================================

export class FeedOrchestrator {
  private currentState: CycleState = 'idle';
  private running = false;
  private cancelRequested = false;

  private readonly clock: () => Date;
  private readonly generateRunId: () => string;
  private readonly discoveryTimeoutMs: number;
  private readonly logger = logger.child({ component: 'feed-orchestrator' });

  constructor(
    private readonly deps: FeedOrchestratorDeps,
    private readonly options: FeedOrchestratorOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.generateRunId = options.generateRunId ?? (() => nanoid());
    this.discoveryTimeoutMs = options.discoveryTimeoutMs ?? 30000;
  }

  get state(): CycleState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Ask the running cycle to stop. Honoured between candidates only; the
   * candidate in flight finishes first. Returns false when nothing is running.
   */
  cancel(): boolean {
    if (!this.running) return false;
    this.cancelRequested = true;
    this.logger.info('Cancellation requested');
    return true;
  }

  /**
   * Run one full cycle. Throws CycleInProgressError when another cycle is
   * active and PersistenceError when the registry or ledger fails.
   */
  async runCycle(options: RunCycleOptions = {}): Promise<CycleRun> {
    // Checked and set before the first await, so concurrent callers cannot both pass
    if (this.running) {
      throw new CycleInProgressError();
    }
    this.running = true;
    this.cancelRequested = false;

    try {
      return await this.executeCycle(options.quota ?? this.options.quota);
    } finally {
      this.running = false;
      this.cancelRequested = false;
      this.currentState = 'idle';
    }
  }

  // ----------------------------------------------------------
  // Cycle phases
  // ----------------------------------------------------------

  private async executeCycle(quota: number): Promise<CycleRun> {
    const { registry, governor } = this.deps;

    const ctx: CycleContext = {
      runId: this.generateRunId(),
      startedAt: this.clock(),
      quota,
      status: 'completed',
      discoveredCount: 0,
      selectedCount: 0,
      processedCount: 0,
      skippedCount: 0,
      deferredCount: 0,
      errors: [],
      records: [],
      resolved: [],
      unresolved: [],
      watermarks: [],
    };

    governor.resetQuota(quota);
    this.logger.info('Starting cycle', { runId: ctx.runId, quota });

    const sources = await registry.listActiveSources();
    if (sources.length === 0) {
      this.logger.info('No active sources', { runId: ctx.runId });
    }

    const candidates = await this.discover(sources, ctx);
    const selected = this.select(sources, candidates, ctx);
    try {
      await this.process(selected, ctx);
      await this.finalize(sources, ctx);
    } catch (error) {
      if (error instanceof PersistenceError && ctx.records.length > 0) {
        throw new CycleAbortedError(ctx.runId, ctx.records, error);
      }
      throw error;
    }

    const run: CycleRun = {
      runId: ctx.runId,
      status: ctx.status,
      startedAt: ctx.startedAt,
      finishedAt: this.clock(),
      quota,
      quotaRemaining: governor.quotaRemaining,
      discoveredCount: ctx.discoveredCount,
      selectedCount: ctx.selectedCount,
      processedCount: ctx.processedCount,
      skippedCount: ctx.skippedCount,
      deferredCount: ctx.deferredCount,
      errors: ctx.errors,
      records: ctx.records,
      watermarks: ctx.watermarks,
    };

    this.logger.info('Cycle finished', {
      runId: run.runId,
      status: run.status,
      discovered: run.discoveredCount,
      selected: run.selectedCount,
      processed: run.processedCount,
      skipped: run.skippedCount,
      deferred: run.deferredCount,
      quotaRemaining: run.quotaRemaining,
      durationMs: run.finishedAt.getTime() - run.startedAt.getTime(),
    });

    return run;
  }

  private async discover(sources: Source[], ctx: CycleContext): Promise<VideoCandidate[]> {
    this.transition('discovering');

    const seen = new Set<string>();
    const candidates: VideoCandidate[] = [];

    for (const source of sources) {
      let videos: DiscoveredVideo[];
      try {
        videos = await withTimeout(
          this.deps.discovery.discover(source.channelRef, source.watermark),
          this.discoveryTimeoutMs,
          `Discovery for ${source.channelRef}`
        );
      } catch (error) {
        const reason = error instanceof PermanentSourceError ? 'discovery_failed' : 'discovery_transient';
        ctx.errors.push({
          disposition: 'source_failed',
          reason,
          sourceId: source.id,
          detail: errorMessage(error),
        });
        this.logger.warn('Discovery failed', {
          sourceId: source.id,
          channelRef: source.channelRef,
          reason,
          error: errorMessage(error),
        });
        continue;
      }

      ctx.discoveredCount += videos.length;
      let admitted = 0;

      for (const raw of videos) {
        const parsed = DiscoveredVideoSchema.safeParse(raw);
        if (!parsed.success) {
          this.logger.warn('Dropping malformed discovery entry', {
            sourceId: source.id,
            issues: parsed.error.issues.map(issue => issue.message),
          });
          continue;
        }

        const video = parsed.data;
        if (video.publishedAt.getTime() <= source.watermark.getTime()) continue;
        if (seen.has(video.videoId)) continue;
        seen.add(video.videoId);

        if (await this.deps.ledger.hasProcessed(video.videoId)) continue;

        candidates.push({ ...video, sourceId: source.id });
        admitted++;
      }

      this.logger.debug('Source discovered', {
        sourceId: source.id,
        found: videos.length,
        admitted,
        since: source.watermark.toISOString(),
      });
    }

    return candidates;
  }

  private select(
    sources: Source[],
    candidates: VideoCandidate[],
    ctx: CycleContext
  ): VideoCandidate[] {
    this.transition('selecting');

    const order = new Map(sources.map((source, index) => [source.id, index]));
    const sorted = sortCandidates(candidates, order);

    const granted = this.deps.governor.reserve(sorted.length);
    const selected = sorted.slice(0, granted);
    ctx.unresolved.push(...sorted.slice(granted));
    ctx.selectedCount = selected.length;

    if (granted < sorted.length) {
      this.logger.warn('Quota reached, leaving candidates for the next cycle', {
        eligible: sorted.length,
        admitted: granted,
      });
    }

    return selected;
  }

  private async process(selected: VideoCandidate[], ctx: CycleContext): Promise<void> {
    this.transition('processing');

    for (let i = 0; i < selected.length; i++) {
      if (this.cancelRequested) {
        ctx.status = 'cancelled';
        ctx.unresolved.push(...selected.slice(i));
        this.logger.warn('Cycle cancelled', { runId: ctx.runId, remaining: selected.length - i });
        return;
      }

      await this.processCandidate(selected[i], ctx);
    }
  }

  private async finalize(sources: Source[], ctx: CycleContext): Promise<void> {
    this.transition('finalizing');

    const targets = computeWatermarkTargets(ctx.resolved, ctx.unresolved);

    // Not transactional: a failure here keeps earlier advances, each covering only resolved videos
    for (const source of sources) {
      const target = targets.get(source.id);
      if (!target) continue;

      const moved = await this.deps.registry.advanceWatermark(source.id, target);
      ctx.watermarks.push({ sourceId: source.id, watermark: target, moved });
    }
  }

  // ----------------------------------------------------------
  // One candidate
  // ----------------------------------------------------------

  private async processCandidate(candidate: VideoCandidate, ctx: CycleContext): Promise<void> {
    const { governor, transcripts, summarization } = this.deps;
    const log = this.logger.child({ videoId: candidate.videoId, sourceId: candidate.sourceId });

    log.info('Processing candidate', {
      title: candidate.title,
      publishedAt: candidate.publishedAt.toISOString(),
    });

    await governor.acquire('transcript');
    const transcript = await transcripts.run(candidate.videoId);

    if (transcript.status !== 'success') {
      await this.handleTranscriptFailure(candidate, transcript, ctx);
      return;
    }
    governor.reportSuccess('transcript');

    const attempts = 1 + this.options.summarizeRetryBudget;
    let lastFailure: FailedOutcome | undefined;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      await governor.acquire('summarize');
      const outcome = await summarization.run({
        videoId: candidate.videoId,
        title: candidate.title,
        text: transcript.value,
        maxLines: this.options.maxLines,
      });

      if (outcome.status === 'success') {
        governor.reportSuccess('summarize');
        await this.recordTerminal(candidate, { kind: 'summarized', summary: outcome.value }, ctx);
        return;
      }

      if (outcome.status !== 'transient') {
        await this.recordTerminal(
          candidate,
          { kind: 'skipped', skipReason: 'summarization_failed' },
          ctx,
          outcome.detail
        );
        return;
      }

      governor.reportTransient('summarize');
      lastFailure = outcome;
      log.warn('Summarization attempt failed transiently', {
        attempt,
        attempts,
        error: outcome.detail,
      });
    }

    const reason: DeferReason =
      lastFailure?.status === 'transient' && lastFailure.error.code === 'rate_limited'
        ? 'rate_limited'
        : 'summarize_transient';
    this.defer(candidate, reason, lastFailure?.detail ?? 'Retry budget exhausted', ctx);
  }

  private async handleTranscriptFailure(
    candidate: VideoCandidate,
    outcome: FailedOutcome,
    ctx: CycleContext
  ): Promise<void> {
    const { governor } = this.deps;

    switch (outcome.status) {
      case 'unavailable':
        governor.reportSuccess('transcript');
        await this.recordTerminal(
          candidate,
          { kind: 'skipped', skipReason: 'no_transcript' },
          ctx,
          outcome.detail
        );
        return;
      case 'transient':
        governor.reportTransient('transcript');
        this.defer(candidate, 'transcript_transient', outcome.detail, ctx);
        return;
      case 'fatal':
        await this.recordTerminal(
          candidate,
          { kind: 'skipped', skipReason: 'transcript_failed' },
          ctx,
          outcome.detail
        );
        return;
    }
  }

  /**
   * Write the ProcessedRecord for a terminal outcome. A lost insert race
   * still counts as resolved; the winning writer's record stands.
   */
  private async recordTerminal(
    candidate: VideoCandidate,
    outcome: RecordOutcome,
    ctx: CycleContext,
    detail?: string
  ): Promise<void> {
    const record: ProcessedRecord = {
      videoId: candidate.videoId,
      sourceId: candidate.sourceId,
      title: candidate.title,
      link: candidate.link,
      outcome,
      publishedAt: candidate.publishedAt,
      processedAt: this.clock(),
    };

    const { inserted } = await this.deps.ledger.markProcessed(record);
    ctx.resolved.push(candidate);
    if (inserted) {
      ctx.records.push(record);
    }

    if (outcome.kind === 'summarized') {
      ctx.processedCount++;
      return;
    }

    ctx.skippedCount++;
    ctx.errors.push({
      disposition: 'skipped',
      reason: outcome.skipReason,
      sourceId: candidate.sourceId,
      videoId: candidate.videoId,
      title: candidate.title,
      detail,
    });
    this.logger.info('Candidate skipped permanently', {
      videoId: candidate.videoId,
      reason: outcome.skipReason,
    });
  }

  private defer(
    candidate: VideoCandidate,
    reason: DeferReason,
    detail: string,
    ctx: CycleContext
  ): void {
    ctx.unresolved.push(candidate);
    ctx.deferredCount++;
    ctx.errors.push({
      disposition: 'deferred',
      reason,
      sourceId: candidate.sourceId,
      videoId: candidate.videoId,
      title: candidate.title,
      detail,
    });
    this.logger.warn('Candidate deferred to a later cycle', {
      videoId: candidate.videoId,
      reason,
      detail,
    });
  }

  private transition(next: CycleState): void {
    this.logger.debug('Cycle state', { from: this.currentState, to: next });
    this.currentState = next;
  }
}
