/**
 * TubeBrief — Summarization Stage
 *
 * Wraps one Summarizer call. Providers are interchangeable behind the
 * Summarizer interface; which one runs is a configuration concern.
 */

import { InvalidInputError } from '../lib/errors';
import { timeOperation, logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import { classifyStageError, type StageOutcome } from './outcome';

export interface Summarizer {
  readonly provider: string;
  summarize(title: string, text: string, maxLines: number): Promise<string>;
}

export interface SummarizationInput {
  videoId: string;
  title: string;
  text: string;
  maxLines: number;
}

export interface SummarizationStageOptions {
  timeoutMs?: number;
}

export class SummarizationStage {
  private readonly timeoutMs: number;
  private readonly logger = logger.child({ component: 'summarization-stage' });

  constructor(
    private readonly summarizer: Summarizer,
    options: SummarizationStageOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 120000;
  }

  async run(input: SummarizationInput): Promise<StageOutcome<string>> {
    const { videoId, title, text, maxLines } = input;

    try {
      const summary = await timeOperation(
        `Summarize ${videoId}`,
        () =>
          withTimeout(
            this.summarizer.summarize(title, text, maxLines),
            this.timeoutMs,
            `Summarization of ${videoId}`
          ),
        this.logger
      );

      const trimmed = summary.trim();
      if (trimmed.length === 0) {
        throw new InvalidInputError('Summarizer returned an empty summary');
      }

      this.logger.info('Summary generated', {
        videoId,
        provider: this.summarizer.provider,
        chars: trimmed.length,
      });
      return { status: 'success', value: trimmed };
    } catch (error) {
      const outcome = classifyStageError(error);
      this.logger.warn('Summarization failed', {
        videoId,
        provider: this.summarizer.provider,
        outcome: outcome.status,
        error: outcome.detail,
      });
      return outcome;
    }
  }
}
