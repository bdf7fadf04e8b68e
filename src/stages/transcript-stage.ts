/**
 * TubeBrief — Transcript Stage
 *
 * Wraps the transcript client. A video without captions is a normal
 * `unavailable` outcome, not an error.
 */

import { timeOperation, logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import { classifyStageError, type StageOutcome } from './outcome';

export interface TranscriptClient {
  /** Clean transcript text, or null when the video has no captions */
  fetch(videoId: string): Promise<string | null>;
}

export interface TranscriptStageOptions {
  timeoutMs?: number;
}

export class TranscriptStage {
  private readonly timeoutMs: number;
  private readonly logger = logger.child({ component: 'transcript-stage' });

  constructor(
    private readonly client: TranscriptClient,
    options: TranscriptStageOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 120000;
  }

  async run(videoId: string): Promise<StageOutcome<string>> {
    try {
      const text = await timeOperation(
        `Transcript ${videoId}`,
        () => withTimeout(this.client.fetch(videoId), this.timeoutMs, `Transcript fetch for ${videoId}`),
        this.logger
      );

      if (text === null || text.trim().length === 0) {
        this.logger.info('No transcript available', { videoId });
        return { status: 'unavailable', detail: 'No captions for this video' };
      }

      this.logger.debug('Transcript fetched', { videoId, chars: text.length });
      return { status: 'success', value: text };
    } catch (error) {
      const outcome = classifyStageError(error);
      this.logger.warn('Transcript fetch failed', {
        videoId,
        outcome: outcome.status,
        error: outcome.detail,
      });
      return outcome;
    }
  }
}
