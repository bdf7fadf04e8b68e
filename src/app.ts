/**
 * TubeBrief — Composition Root
 *
 * Wires the Supabase stores, providers and engine components into a ready
 * FeedOrchestrator. Scripts and the trigger server start from here.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './lib/config';
import { createSupabaseClient } from './db/client';
import { SupabaseDigestArchive, SupabaseLedgerStore, SupabaseSourceStore } from './db/queries';
import { SourceRegistry } from './registry/source-registry';
import { DedupLedger } from './ledger/dedup-ledger';
import { RateGovernor } from './governor/rate-governor';
import { TranscriptStage, SummarizationStage } from './stages';
import { FeedOrchestrator } from './orchestrator';
import { YouTubeRssDiscovery } from './providers/youtube-rss';
import { YouTubeCaptionsClient } from './providers/captions';
import { createSummarizer } from './providers/llm';
import type { DigestArchive } from './digest/digest';

export interface Pipeline {
  client: SupabaseClient;
  sources: SupabaseSourceStore;
  registry: SourceRegistry;
  ledger: DedupLedger;
  archive: DigestArchive;
  orchestrator: FeedOrchestrator;
}

export function createPipeline(config: AppConfig): Pipeline {
  const client = createSupabaseClient(config.supabase);
  const sources = new SupabaseSourceStore(client);

  const registry = new SourceRegistry(sources, {
    initialLookbackHours: config.cycle.initialLookbackHours,
  });
  const ledger = new DedupLedger(new SupabaseLedgerStore(client));
  const governor = new RateGovernor(config.governor);

  const stageOptions = { timeoutMs: config.cycle.stageTimeoutMs };
  const transcripts = new TranscriptStage(
    new YouTubeCaptionsClient({ lang: config.transcript.lang }),
    stageOptions
  );
  const summarization = new SummarizationStage(
    createSummarizer(config.llm, config.cycle.stageTimeoutMs),
    stageOptions
  );

  const orchestrator = new FeedOrchestrator(
    {
      registry,
      ledger,
      governor,
      discovery: new YouTubeRssDiscovery(),
      transcripts,
      summarization,
    },
    {
      quota: config.cycle.quota,
      maxLines: config.cycle.maxLines,
      summarizeRetryBudget: config.cycle.summarizeRetryBudget,
    }
  );

  return {
    client,
    sources,
    registry,
    ledger,
    archive: new SupabaseDigestArchive(client),
    orchestrator,
  };
}
