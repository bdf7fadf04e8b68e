/**
 * TubeBrief — Daily Digest
 *
 * Projects a cycle's newly summarized records into the dated digest
 * artifact. Skipped records never appear in a digest. The link always comes
 * from discovery, never from the LLM.
 */

import type { ProcessedRecord } from '../types';

// ============================================================
// TYPES
// ============================================================

export interface DigestItem {
  videoId: string;
  title: string;
  summary: string;
  link: string;
  publishedAt: string;
}

export interface Digest {
  /** YYYY-MM-DD (UTC) */
  date: string;
  count: number;
  items: DigestItem[];
}

/**
 * Where digests are archived after a cycle.
 */
export interface DigestArchive {
  archive(digest: Digest, runId: string): Promise<void>;
}

// ============================================================
// BUILDING
// ============================================================

export function formatDigestDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Build the digest for a set of records, keeping their order.
 */
export function buildDigest(records: ProcessedRecord[], date: Date = new Date()): Digest {
  const items: DigestItem[] = [];

  for (const record of records) {
    if (record.outcome.kind !== 'summarized') continue;

    items.push({
      videoId: record.videoId,
      title: record.title,
      summary: record.outcome.summary,
      link: record.link,
      publishedAt: record.publishedAt.toISOString(),
    });
  }

  return {
    date: formatDigestDate(date),
    count: items.length,
    items,
  };
}

// ============================================================
// RENDERING
// ============================================================

export function exportDigestAsJson(digest: Digest): string {
  return JSON.stringify(digest, null, 2);
}

export function renderDigestMarkdown(digest: Digest): string {
  const lines: string[] = [`# Daily Digest — ${digest.date}`, ''];

  if (digest.count === 0) {
    lines.push('_No new videos._');
    return lines.join('\n');
  }

  lines.push(`${digest.count} new video${digest.count === 1 ? '' : 's'}.`, '');

  for (const item of digest.items) {
    lines.push(`## [${item.title}](${item.link})`);
    lines.push(`_Published ${item.publishedAt}_`);
    lines.push('');
    lines.push(item.summary);
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
