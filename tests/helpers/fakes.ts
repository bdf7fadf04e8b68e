/**
 * TubeBrief — Test Fakes
 *
 * In-process stand-ins for the stores and collaborators. The stores keep the
 * same contracts as the Supabase implementations: compare-and-set watermarks
 * and a ledger unique on videoId.
 */

import { vi } from 'vitest';
import { AlreadyExistsError, NotFoundError } from '../../src/lib/errors';
import { RateGovernor } from '../../src/governor/rate-governor';
import { SourceRegistry, type SourceStore } from '../../src/registry/source-registry';
import { DedupLedger, type LedgerStore } from '../../src/ledger/dedup-ledger';
import { TranscriptStage, SummarizationStage, type Summarizer, type TranscriptClient } from '../../src/stages';
import { FeedOrchestrator, type DiscoveryClient } from '../../src/orchestrator';
import type { GovernorConfig } from '../../src/lib/config';
import type { DiscoveredVideo, ProcessedRecord, StoredSource } from '../../src/types';

// ============================================================
// STORES
// ============================================================

export class InMemorySourceStore implements SourceStore {
  readonly sources: StoredSource[];
  failWith?: Error;
  /** Watermark writes that fail, by source id */
  readonly setFailures = new Map<string, Error>();

  constructor(sources: StoredSource[] = []) {
    this.sources = sources.map(source => ({ ...source }));
  }

  async listActive(): Promise<StoredSource[]> {
    if (this.failWith) throw this.failWith;
    return this.sources.map(source => ({ ...source }));
  }

  async getWatermark(sourceId: string): Promise<Date | null> {
    if (this.failWith) throw this.failWith;
    return this.find(sourceId).watermark;
  }

  async setWatermark(sourceId: string, ts: Date): Promise<boolean> {
    if (this.failWith) throw this.failWith;
    const failure = this.setFailures.get(sourceId);
    if (failure) throw failure;
    const source = this.find(sourceId);
    if (source.watermark !== null && source.watermark.getTime() >= ts.getTime()) {
      return false;
    }
    source.watermark = ts;
    return true;
  }

  watermarkOf(sourceId: string): Date | null {
    return this.find(sourceId).watermark;
  }

  private find(sourceId: string): StoredSource {
    const source = this.sources.find(s => s.id === sourceId);
    if (!source) throw new NotFoundError(`Channel not found: ${sourceId}`);
    return source;
  }
}

export class InMemoryLedgerStore implements LedgerStore {
  readonly records = new Map<string, ProcessedRecord>();
  failWith?: Error;
  /** Fail only inserts, after reads succeeded */
  failInsertWith?: Error;
  /** Insert failures for single videos */
  readonly insertFailures = new Map<string, Error>();
  /** Records another writer lands just before our insert of the same video */
  readonly rivals = new Map<string, ProcessedRecord>();

  async exists(videoId: string): Promise<boolean> {
    if (this.failWith) throw this.failWith;
    return this.records.has(videoId);
  }

  async insert(record: ProcessedRecord): Promise<void> {
    if (this.failWith) throw this.failWith;
    if (this.failInsertWith) throw this.failInsertWith;
    const failure = this.insertFailures.get(record.videoId);
    if (failure) throw failure;
    const rival = this.rivals.get(record.videoId);
    if (rival) this.records.set(rival.videoId, rival);
    if (this.records.has(record.videoId)) {
      throw new AlreadyExistsError(`Video already recorded: ${record.videoId}`);
    }
    this.records.set(record.videoId, record);
  }

  async listRecent(limit: number): Promise<ProcessedRecord[]> {
    if (this.failWith) throw this.failWith;
    return [...this.records.values()]
      .sort((a, b) => b.processedAt.getTime() - a.processedAt.getTime())
      .slice(0, limit);
  }
}

// ============================================================
// COLLABORATORS
// ============================================================

export class FakeDiscovery implements DiscoveryClient {
  readonly calls: Array<{ channelRef: string; since: Date }> = [];
  private readonly videos = new Map<string, DiscoveredVideo[]>();
  private readonly failures = new Map<string, Error>();

  setVideos(channelRef: string, videos: DiscoveredVideo[]): void {
    this.videos.set(channelRef, videos);
  }

  failFor(channelRef: string, error: Error): void {
    this.failures.set(channelRef, error);
  }

  async discover(channelRef: string, since: Date): Promise<DiscoveredVideo[]> {
    this.calls.push({ channelRef, since });
    const failure = this.failures.get(channelRef);
    if (failure) throw failure;
    return (this.videos.get(channelRef) ?? []).filter(
      video => video.publishedAt.getTime() > since.getTime()
    );
  }
}

/** Scripted transcript result: text, null for no captions, or an error to throw. */
export type ScriptedTranscript = string | null | Error;

export class ScriptedTranscriptClient implements TranscriptClient {
  readonly calls: string[] = [];

  constructor(private readonly script: Record<string, ScriptedTranscript> = {}) {}

  set(videoId: string, value: ScriptedTranscript): void {
    this.script[videoId] = value;
  }

  async fetch(videoId: string): Promise<string | null> {
    this.calls.push(videoId);
    // Unscripted videos have a usable transcript
    if (!(videoId in this.script)) return TRANSCRIPT_TEXT;
    const value = this.script[videoId];
    if (value instanceof Error) throw value;
    return value;
  }
}

/**
 * Replies from a per-video queue; once a queue runs dry the summarizer
 * answers with a default summary.
 */
export class ScriptedSummarizer implements Summarizer {
  readonly provider = 'fake';
  readonly calls: Array<{ title: string; maxLines: number }> = [];
  private readonly queues = new Map<string, Array<string | Error>>();

  queue(title: string, ...replies: Array<string | Error>): void {
    this.queues.set(title, replies);
  }

  async summarize(title: string, _text: string, maxLines: number): Promise<string> {
    this.calls.push({ title, maxLines });
    const next = this.queues.get(title)?.shift();
    if (next instanceof Error) throw next;
    return next ?? `Summary of ${title}`;
  }
}

// ============================================================
// FACTORIES
// ============================================================

export const TEST_GOVERNOR_CONFIG: GovernorConfig = {
  windows: {
    transcript: { minDelayMs: 2000, maxDelayMs: 5000 },
    summarize: { minDelayMs: 3000, maxDelayMs: 7000 },
  },
  backoffBaseMs: 2000,
  backoffCapMs: 60000,
};

/** Governor that records its sleeps instead of waiting. */
export function createInstantGovernor(random = () => 0) {
  const sleep = vi.fn(async (_ms: number) => {});
  const governor = new RateGovernor(TEST_GOVERNOR_CONFIG, { random, sleep });
  return { governor, sleep };
}

export const CLOCK_NOW = new Date('2026-03-10T12:00:00.000Z');

export function at(iso: string): Date {
  return new Date(iso);
}

export function video(videoId: string, publishedAt: string, title = `Video ${videoId}`): DiscoveredVideo {
  return {
    videoId,
    title,
    publishedAt: new Date(publishedAt),
    link: `https://www.youtube.com/watch?v=${videoId}`,
  };
}

export function source(id: string, watermark: string | null, channelRef = `ref-${id}`): StoredSource {
  return {
    id,
    name: `Channel ${id}`,
    channelRef,
    watermark: watermark === null ? null : new Date(watermark),
  };
}

/** Long enough to pass the summarizers' minimum content check */
export const TRANSCRIPT_TEXT =
  'This is a long enough transcript about building resilient polling pipelines in practice.';

export interface HarnessOptions {
  sources?: StoredSource[];
  quota?: number;
  summarizeRetryBudget?: number;
  transcripts?: Record<string, ScriptedTranscript>;
}

export function createHarness(options: HarnessOptions = {}) {
  const sourceStore = new InMemorySourceStore(options.sources ?? []);
  const ledgerStore = new InMemoryLedgerStore();
  const discovery = new FakeDiscovery();
  const transcriptClient = new ScriptedTranscriptClient(options.transcripts);
  const summarizer = new ScriptedSummarizer();
  const { governor, sleep } = createInstantGovernor();

  const registry = new SourceRegistry(sourceStore, { clock: () => CLOCK_NOW });
  const ledger = new DedupLedger(ledgerStore);

  let runCounter = 0;
  const orchestrator = new FeedOrchestrator(
    {
      registry,
      ledger,
      governor,
      discovery,
      transcripts: new TranscriptStage(transcriptClient, { timeoutMs: 1000 }),
      summarization: new SummarizationStage(summarizer, { timeoutMs: 1000 }),
    },
    {
      quota: options.quota ?? 5,
      maxLines: 6,
      summarizeRetryBudget: options.summarizeRetryBudget ?? 2,
      clock: () => CLOCK_NOW,
      generateRunId: () => `run-${++runCounter}`,
    }
  );

  return {
    sourceStore,
    ledgerStore,
    discovery,
    transcriptClient,
    summarizer,
    governor,
    sleep,
    registry,
    ledger,
    orchestrator,
  };
}
