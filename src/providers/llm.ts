/**
 * TubeBrief — LLM Summarizers
 *
 * One capability, several providers: Anthropic through its own SDK, and
 * Groq / Ollama / OpenAI through the OpenAI-compatible chat API.
 *
 * SDK retries are disabled. Retrying and backoff belong to the rate
 * governor, so provider failures are mapped straight onto the error
 * taxonomy.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import {
  ConfigurationError,
  InvalidInputError,
  RateLimitedError,
  TransientNetworkError,
  TubeBriefError,
  errorMessage,
} from '../lib/errors';
import type { LLMConfig, LLMProviderName } from '../lib/config';
import type { Summarizer } from '../stages/summarization-stage';

// ============================================================
// CONFIGURATION
// ============================================================

export const MIN_CONTENT_CHARS = 50;
const MAX_TOKENS = 512;
const TEMPERATURE = 0.7;

const SYSTEM_PROMPT =
  'You are a professional news summarizer. Create concise, accurate summaries without including URLs or sources.';

// ============================================================
// PROMPT
// ============================================================

export function buildSummaryPrompt(title: string, text: string, maxLines: number): string {
  return `You are a professional news summarizer. Your task is to create a concise, neutral summary.

Title: ${title}

Content:
${text}

Please provide a summary in exactly ${maxLines} lines or fewer.
- Use neutral, professional tone
- Preserve technical meaning and important details
- Do NOT mention sources or links
- Do NOT include URLs
- Be concise and clear

Summary:`;
}

/**
 * Reject content too short to summarize before spending a metered call.
 */
export function assertSummarizable(text: string): void {
  if (text.trim().length < MIN_CONTENT_CHARS) {
    throw new InvalidInputError(
      `Content too short to summarize (${text.trim().length} chars, minimum ${MIN_CONTENT_CHARS})`
    );
  }
}

// ============================================================
// ERROR MAPPING
// ============================================================

/**
 * Map an HTTP status from a provider onto the error taxonomy.
 * A missing status means the request never got a response.
 */
export function errorForStatus(
  status: number | undefined,
  message: string,
  cause?: unknown
): TubeBriefError {
  if (status === undefined) {
    return new TransientNetworkError(message, { cause });
  }
  if (status === 429) {
    return new RateLimitedError(message, { cause });
  }
  if (status === 400 || status === 413 || status === 422) {
    return new InvalidInputError(message, { cause });
  }
  if (status === 401 || status === 403 || status === 404) {
    return new ConfigurationError(message, { cause });
  }
  return new TransientNetworkError(message, { cause });
}

export function toProviderError(error: unknown): TubeBriefError {
  if (error instanceof TubeBriefError) return error;
  if (error instanceof Anthropic.APIError || error instanceof OpenAI.APIError) {
    return errorForStatus(error.status, error.message, error);
  }
  return new TransientNetworkError(errorMessage(error), { cause: error });
}

// ============================================================
// PROVIDERS
// ============================================================

export interface SummarizerOptions {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class AnthropicSummarizer implements Summarizer {
  readonly provider = 'anthropic';
  private readonly client: Anthropic;

  constructor(private readonly options: SummarizerOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError('Anthropic summarizer requires an API key');
    }
    this.client = new Anthropic({
      apiKey: options.apiKey,
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
  }

  async summarize(title: string, text: string, maxLines: number): Promise<string> {
    assertSummarizable(text);

    const response = await this.client.messages
      .create({
        model: this.options.model,
        max_tokens: MAX_TOKENS,
        temperature: TEMPERATURE,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: buildSummaryPrompt(title, text, maxLines) }],
      })
      .catch((error: unknown) => {
        throw toProviderError(error);
      });

    return response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
  }
}

/**
 * Any provider speaking the OpenAI chat completions API.
 */
export class OpenAICompatibleSummarizer implements Summarizer {
  private readonly client: OpenAI;

  constructor(
    readonly provider: Exclude<LLMProviderName, 'anthropic'>,
    private readonly options: SummarizerOptions
  ) {
    if (!options.apiKey && provider !== 'ollama') {
      throw new ConfigurationError(`${provider} summarizer requires an API key`);
    }
    this.client = new OpenAI({
      // Ollama ignores the key but the client requires one
      apiKey: options.apiKey ?? 'ollama',
      baseURL: options.baseUrl,
      maxRetries: 0,
      timeout: options.timeoutMs,
    });
  }

  async summarize(title: string, text: string, maxLines: number): Promise<string> {
    assertSummarizable(text);

    const completion = await this.client.chat.completions
      .create({
        model: this.options.model,
        max_tokens: MAX_TOKENS,
        temperature: TEMPERATURE,
        top_p: 0.9,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildSummaryPrompt(title, text, maxLines) },
        ],
      })
      .catch((error: unknown) => {
        throw toProviderError(error);
      });

    return completion.choices[0]?.message?.content?.trim() ?? '';
  }
}

/**
 * Pick the summarizer for the configured provider.
 */
export function createSummarizer(config: LLMConfig, timeoutMs?: number): Summarizer {
  const options: SummarizerOptions = {
    model: config.model,
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs,
  };

  if (config.provider === 'anthropic') {
    return new AnthropicSummarizer(options);
  }
  return new OpenAICompatibleSummarizer(config.provider, options);
}
