/**
 * TubeBrief — YouTube RSS Discovery
 *
 * Finds a channel's recent uploads through the public channel feed
 * (no API key). The feed lists roughly the 15 latest videos, so discovery
 * is only complete when cycles run at least that often.
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import {
  PermanentSourceError,
  TransientNetworkError,
  errorMessage,
} from '../lib/errors';
import { logger } from '../lib/logger';
import type { DiscoveryClient } from '../orchestrator/feed-orchestrator';
import type { DiscoveredVideo } from '../types';

const FEED_URL = 'https://www.youtube.com/feeds/videos.xml';
const CHANNEL_ID_PATTERN = /^UC[\w-]{22}$/;

// ============================================================
// FEED PARSING
// ============================================================

const LinkSchema = z.object({
  '@_rel': z.string().optional(),
  '@_href': z.string(),
});

const EntrySchema = z.object({
  'yt:videoId': z.string().min(1),
  title: z.string().default(''),
  published: z.string(),
  link: z.union([LinkSchema, z.array(LinkSchema)]).optional(),
});

const FeedSchema = z.object({
  feed: z.object({
    title: z.string().optional(),
    entry: z.array(z.unknown()).default([]),
  }),
});

export interface ParsedChannelFeed {
  channelTitle?: string;
  videos: DiscoveredVideo[];
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  isArray: name => name === 'entry',
});

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

function alternateLink(entry: z.infer<typeof EntrySchema>): string {
  const links = Array.isArray(entry.link) ? entry.link : entry.link ? [entry.link] : [];
  const alternate = links.find(link => link['@_rel'] === undefined || link['@_rel'] === 'alternate');
  return alternate?.['@_href'] ?? watchUrl(entry['yt:videoId']);
}

/**
 * Parse a channel feed document. Entries without a video id or a valid
 * publish time are dropped.
 */
export function parseChannelFeed(xml: string): ParsedChannelFeed {
  const parsed = FeedSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    throw new TransientNetworkError('Channel feed is not a valid Atom document');
  }

  const videos: DiscoveredVideo[] = [];

  for (const raw of parsed.data.feed.entry) {
    const entry = EntrySchema.safeParse(raw);
    if (!entry.success) continue;

    const publishedAt = new Date(entry.data.published);
    if (Number.isNaN(publishedAt.getTime())) continue;

    videos.push({
      videoId: entry.data['yt:videoId'],
      title: entry.data.title,
      publishedAt,
      link: alternateLink(entry.data),
    });
  }

  return { channelTitle: parsed.data.feed.title, videos };
}

// ============================================================
// DISCOVERY CLIENT
// ============================================================

export interface YouTubeRssDiscoveryOptions {
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class YouTubeRssDiscovery implements DiscoveryClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger = logger.child({ component: 'youtube-rss' });

  constructor(options: YouTubeRssDiscoveryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async discover(channelRef: string, since: Date): Promise<DiscoveredVideo[]> {
    if (!CHANNEL_ID_PATTERN.test(channelRef)) {
      throw new PermanentSourceError(`Not a channel id: ${channelRef}`);
    }

    const url = `${FEED_URL}?channel_id=${encodeURIComponent(channelRef)}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw new TransientNetworkError(`Feed request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (response.status === 404 || response.status === 400) {
      throw new PermanentSourceError(`Channel feed not found for ${channelRef} (${response.status})`);
    }
    if (!response.ok) {
      throw new TransientNetworkError(`Channel feed returned ${response.status}`);
    }

    const { channelTitle, videos } = parseChannelFeed(await response.text());
    const fresh = videos.filter(video => video.publishedAt.getTime() > since.getTime());

    this.logger.debug('Channel feed read', {
      channelRef,
      channelTitle,
      entries: videos.length,
      newSince: fresh.length,
    });

    return fresh;
  }
}
