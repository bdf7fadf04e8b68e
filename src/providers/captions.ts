/**
 * TubeBrief — Caption Transcripts
 *
 * Transcript client backed by youtube-captions-scraper.
 */

import { getSubtitles } from 'youtube-captions-scraper';
import { TransientNetworkError, errorMessage } from '../lib/errors';
import type { TranscriptClient } from '../stages/transcript-stage';

const NO_CAPTIONS_PATTERN = /could not find captions|no captions/i;

/**
 * Join caption cues into plain text: drop bracketed sound cues such as
 * [Music], collapse whitespace.
 */
export function cleanTranscript(text: string): string {
  return text
    .replace(/\[[^\]]*\]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export class YouTubeCaptionsClient implements TranscriptClient {
  private readonly lang: string;

  constructor(options: { lang?: string } = {}) {
    this.lang = options.lang ?? 'en';
  }

  async fetch(videoId: string): Promise<string | null> {
    let captions: Array<{ text: string }>;
    try {
      captions = await getSubtitles({ videoID: videoId, lang: this.lang });
    } catch (error) {
      if (NO_CAPTIONS_PATTERN.test(errorMessage(error))) {
        return null;
      }
      throw new TransientNetworkError(`Caption request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (captions.length === 0) return null;

    const text = cleanTranscript(captions.map(caption => caption.text).join(' '));
    return text.length > 0 ? text : null;
  }
}
