/**
 * TubeBrief — Database Stores
 *
 * Supabase-backed implementations of the registry, ledger and digest
 * archive contracts. Rows are validated with zod on the way out so a schema
 * drift shows up as a PersistenceError instead of a half-read record.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AlreadyExistsError, NotFoundError, PersistenceError } from '../lib/errors';
import { handleSupabaseError } from './client';
import type { SourceStore } from '../registry/source-registry';
import type { LedgerStore } from '../ledger/dedup-ledger';
import type { Digest, DigestArchive } from '../digest/digest';
import type { ProcessedRecord, RecordOutcome, StoredSource } from '../types';

const UNIQUE_VIOLATION = '23505';

function parseRows<T>(schema: z.ZodType<T>, data: unknown, operation: string): T[] {
  const parsed = z.array(schema).safeParse(data ?? []);
  if (!parsed.success) {
    throw new PersistenceError(`${operation}: unexpected row shape (${parsed.error.issues[0]?.message ?? 'invalid'})`);
  }
  return parsed.data;
}

// ============================================================
// CHANNELS
// ============================================================

const ChannelRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  channel_id: z.string(),
  last_checked: z.string().nullable(),
});

export interface RegisterChannelInput {
  name: string;
  channelRef: string;
  url?: string;
}

export class SupabaseSourceStore implements SourceStore {
  constructor(private readonly client: SupabaseClient) {}

  async listActive(): Promise<StoredSource[]> {
    const { data, error } = await this.client
      .from('channels')
      .select('id, name, channel_id, last_checked')
      .eq('active', true)
      .order('created_at', { ascending: true })
      .order('id', { ascending: true });

    if (error) throw handleSupabaseError('List channels', error);

    return parseRows(ChannelRowSchema, data, 'List channels').map(row => ({
      id: row.id,
      name: row.name,
      channelRef: row.channel_id,
      watermark: row.last_checked === null ? null : new Date(row.last_checked),
    }));
  }

  async getWatermark(sourceId: string): Promise<Date | null> {
    const { data, error } = await this.client
      .from('channels')
      .select('id, name, channel_id, last_checked')
      .eq('id', sourceId)
      .maybeSingle();

    if (error) throw handleSupabaseError('Read channel', error);

    const [row] = parseRows(ChannelRowSchema, data === null ? [] : [data], 'Read channel');
    if (!row) {
      throw new NotFoundError(`Channel not found: ${sourceId}`);
    }
    return row.last_checked === null ? null : new Date(row.last_checked);
  }

  /**
   * Conditional update: only rows whose watermark is null or earlier than
   * `ts` match, so the stored value never regresses.
   */
  async setWatermark(sourceId: string, ts: Date): Promise<boolean> {
    const iso = ts.toISOString();
    const { data, error } = await this.client
      .from('channels')
      .update({ last_checked: iso })
      .eq('id', sourceId)
      .or(`last_checked.is.null,last_checked.lt."${iso}"`)
      .select('id');

    if (error) throw handleSupabaseError('Advance watermark', error);

    if (Array.isArray(data) && data.length > 0) {
      return true;
    }

    // Nothing matched: either already past ts, or unknown channel
    await this.getWatermark(sourceId);
    return false;
  }

  /**
   * Add a channel, or refresh its name when the channel id is already known.
   * The watermark is left untouched.
   */
  async register(input: RegisterChannelInput): Promise<string> {
    const { data, error } = await this.client
      .from('channels')
      .upsert(
        {
          name: input.name,
          channel_id: input.channelRef,
          url: input.url ?? `https://www.youtube.com/channel/${input.channelRef}`,
          active: true,
        },
        { onConflict: 'channel_id' }
      )
      .select('id')
      .single();

    if (error) throw handleSupabaseError('Register channel', error);

    const parsed = z.object({ id: z.string() }).safeParse(data);
    if (!parsed.success) {
      throw new PersistenceError('Register channel: no id returned');
    }
    return parsed.data.id;
  }
}

// ============================================================
// VIDEO SUMMARIES
// ============================================================

const SkipReasonSchema = z.enum(['no_transcript', 'transcript_failed', 'summarization_failed']);

const SummaryRowSchema = z.object({
  video_id: z.string(),
  channel_id: z.string(),
  title: z.string(),
  summary: z.string().nullable(),
  skip_reason: SkipReasonSchema.nullable(),
  link: z.string(),
  published_at: z.string(),
  processed_at: z.string(),
});
type SummaryRow = z.infer<typeof SummaryRowSchema>;

function toOutcome(row: SummaryRow): RecordOutcome {
  if (row.summary !== null) {
    return { kind: 'summarized', summary: row.summary };
  }
  if (row.skip_reason !== null) {
    return { kind: 'skipped', skipReason: row.skip_reason };
  }
  throw new PersistenceError(`Summary row ${row.video_id} has neither summary nor skip reason`);
}

export function toSummaryRow(record: ProcessedRecord): SummaryRow {
  return {
    video_id: record.videoId,
    channel_id: record.sourceId,
    title: record.title,
    summary: record.outcome.kind === 'summarized' ? record.outcome.summary : null,
    skip_reason: record.outcome.kind === 'skipped' ? record.outcome.skipReason : null,
    link: record.link,
    published_at: record.publishedAt.toISOString(),
    processed_at: record.processedAt.toISOString(),
  };
}

export function fromSummaryRow(row: SummaryRow): ProcessedRecord {
  return {
    videoId: row.video_id,
    sourceId: row.channel_id,
    title: row.title,
    link: row.link,
    outcome: toOutcome(row),
    publishedAt: new Date(row.published_at),
    processedAt: new Date(row.processed_at),
  };
}

export class SupabaseLedgerStore implements LedgerStore {
  constructor(private readonly client: SupabaseClient) {}

  async exists(videoId: string): Promise<boolean> {
    const { count, error } = await this.client
      .from('video_summaries')
      .select('video_id', { count: 'exact', head: true })
      .eq('video_id', videoId);

    if (error) throw handleSupabaseError('Check video', error);
    return (count ?? 0) > 0;
  }

  async insert(record: ProcessedRecord): Promise<void> {
    const { error } = await this.client.from('video_summaries').insert(toSummaryRow(record));

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new AlreadyExistsError(`Video already recorded: ${record.videoId}`);
      }
      throw handleSupabaseError('Record video', error);
    }
  }

  async listRecent(limit: number): Promise<ProcessedRecord[]> {
    const { data, error } = await this.client
      .from('video_summaries')
      .select('*')
      .order('processed_at', { ascending: false })
      .limit(limit);

    if (error) throw handleSupabaseError('List summaries', error);
    return parseRows(SummaryRowSchema, data, 'List summaries').map(fromSummaryRow);
  }
}

// ============================================================
// DIGESTS
// ============================================================

export class SupabaseDigestArchive implements DigestArchive {
  constructor(private readonly client: SupabaseClient) {}

  async archive(digest: Digest, runId: string): Promise<void> {
    const { error } = await this.client.from('digests').upsert(
      {
        run_id: runId,
        digest_date: digest.date,
        item_count: digest.count,
        items: digest.items,
      },
      { onConflict: 'run_id' }
    );

    if (error) throw handleSupabaseError('Archive digest', error);
  }
}
