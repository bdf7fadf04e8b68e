/**
 * TubeBrief — Configuration
 *
 * Reads the environment (and .env through dotenv) once, validates it with
 * zod and hands out a typed AppConfig. Any problem surfaces as a
 * ConfigurationError before a cycle is ever started.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { StageKind } from '../types';

// ============================================================
// TYPES
// ============================================================

export type LLMProviderName = 'anthropic' | 'groq' | 'ollama' | 'openai';

export interface StageWindow {
  minDelayMs: number;
  maxDelayMs: number;
}

export interface GovernorConfig {
  windows: Record<StageKind, StageWindow>;
  backoffBaseMs: number;
  backoffCapMs: number;
}

export interface LLMConfig {
  provider: LLMProviderName;
  model: string;
  apiKey?: string;
  baseUrl?: string;
}

export interface CycleConfig {
  /** Maximum candidates admitted per run */
  quota: number;
  maxLines: number;
  /** Summarization retries after the first attempt */
  summarizeRetryBudget: number;
  stageTimeoutMs: number;
  initialLookbackHours: number;
}

export interface AppConfig {
  supabase: {
    url: string;
    serviceRoleKey: string;
  };
  llm: LLMConfig;
  cycle: CycleConfig;
  governor: GovernorConfig;
  transcript: {
    lang: string;
  };
  trigger: {
    port: number;
    secret?: string;
  };
  digest: {
    outputPath: string;
  };
}

// ============================================================
// DEFAULTS
// ============================================================

export const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  anthropic: 'claude-3-5-haiku-20241022',
  groq: 'llama-3.3-70b-versatile',
  ollama: 'gemma3:4b',
  openai: 'gpt-4o-mini',
};

const PROVIDER_BASE_URLS: Partial<Record<LLMProviderName, string>> = {
  groq: 'https://api.groq.com/openai/v1',
};

const PROVIDER_KEY_VARS: Partial<Record<LLMProviderName, string>> = {
  anthropic: 'ANTHROPIC_API_KEY',
  groq: 'GROQ_API_KEY',
  openai: 'OPENAI_API_KEY',
};

export const DEFAULT_GOVERNOR_CONFIG: GovernorConfig = {
  windows: {
    transcript: { minDelayMs: 2000, maxDelayMs: 5000 },
    summarize: { minDelayMs: 3000, maxDelayMs: 7000 },
  },
  backoffBaseMs: 2000,
  backoffCapMs: 60000,
};

// ============================================================
// SCHEMA
// ============================================================

// dotenv reads `KEY=` as an empty string; treat it as unset
const blank = (value: unknown): unknown => (value === '' ? undefined : value);

const optionalString = () => z.preprocess(blank, z.string().min(1).optional());
const int = (fallback: number) =>
  z.preprocess(blank, z.coerce.number().int().nonnegative().default(fallback));
const positiveInt = (fallback: number) =>
  z.preprocess(blank, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),

  LLM_PROVIDER: z.preprocess(
    blank,
    z.enum(['anthropic', 'groq', 'ollama', 'openai']).default('anthropic')
  ),
  LLM_MODEL: optionalString(),
  ANTHROPIC_API_KEY: optionalString(),
  GROQ_API_KEY: optionalString(),
  OPENAI_API_KEY: optionalString(),
  OLLAMA_BASE_URL: z.preprocess(blank, z.string().url().default('http://localhost:11434/v1')),

  MAX_VIDEOS_PER_RUN: positiveInt(5),
  SUMMARY_MAX_LINES: positiveInt(6),
  SUMMARIZE_RETRY_BUDGET: int(2),
  STAGE_TIMEOUT_MS: positiveInt(120000),
  INITIAL_LOOKBACK_HOURS: z.preprocess(blank, z.coerce.number().positive().default(24)),

  TRANSCRIPT_MIN_DELAY_MS: int(DEFAULT_GOVERNOR_CONFIG.windows.transcript.minDelayMs),
  TRANSCRIPT_MAX_DELAY_MS: int(DEFAULT_GOVERNOR_CONFIG.windows.transcript.maxDelayMs),
  SUMMARIZE_MIN_DELAY_MS: int(DEFAULT_GOVERNOR_CONFIG.windows.summarize.minDelayMs),
  SUMMARIZE_MAX_DELAY_MS: int(DEFAULT_GOVERNOR_CONFIG.windows.summarize.maxDelayMs),
  BACKOFF_BASE_MS: int(DEFAULT_GOVERNOR_CONFIG.backoffBaseMs),
  BACKOFF_CAP_MS: int(DEFAULT_GOVERNOR_CONFIG.backoffCapMs),

  TRANSCRIPT_LANG: z.preprocess(blank, z.string().min(2).default('en')),
  TRIGGER_PORT: positiveInt(3001),
  TRIGGER_SECRET: optionalString(),
  DIGEST_OUTPUT_PATH: z.preprocess(blank, z.string().min(1).default('daily_digest.json')),
});

type Env = z.infer<typeof EnvSchema>;

// ============================================================
// LOADING
// ============================================================

function resolveLLMConfig(env: Env): LLMConfig {
  const provider = env.LLM_PROVIDER;
  const model = env.LLM_MODEL ?? DEFAULT_MODELS[provider];

  if (provider === 'ollama') {
    return { provider, model, baseUrl: env.OLLAMA_BASE_URL };
  }

  const keyVar = PROVIDER_KEY_VARS[provider];
  const apiKey =
    provider === 'anthropic'
      ? env.ANTHROPIC_API_KEY
      : provider === 'groq'
        ? env.GROQ_API_KEY
        : env.OPENAI_API_KEY;

  if (!apiKey) {
    throw new ConfigurationError(`${keyVar} is required when LLM_PROVIDER=${provider}`);
  }

  return { provider, model, apiKey, baseUrl: PROVIDER_BASE_URLS[provider] };
}

function checkWindow(stage: StageKind, window: StageWindow): void {
  if (window.minDelayMs > window.maxDelayMs) {
    throw new ConfigurationError(
      `${stage} delay window is inverted: ${window.minDelayMs}ms > ${window.maxDelayMs}ms`
    );
  }
}

/**
 * Load and validate configuration from an environment map.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const env = parsed.data;

  const governor: GovernorConfig = {
    windows: {
      transcript: {
        minDelayMs: env.TRANSCRIPT_MIN_DELAY_MS,
        maxDelayMs: env.TRANSCRIPT_MAX_DELAY_MS,
      },
      summarize: {
        minDelayMs: env.SUMMARIZE_MIN_DELAY_MS,
        maxDelayMs: env.SUMMARIZE_MAX_DELAY_MS,
      },
    },
    backoffBaseMs: env.BACKOFF_BASE_MS,
    backoffCapMs: env.BACKOFF_CAP_MS,
  };

  checkWindow('transcript', governor.windows.transcript);
  checkWindow('summarize', governor.windows.summarize);

  if (governor.backoffBaseMs > governor.backoffCapMs) {
    throw new ConfigurationError('BACKOFF_BASE_MS must not exceed BACKOFF_CAP_MS');
  }

  return {
    supabase: {
      url: env.SUPABASE_URL,
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    },
    llm: resolveLLMConfig(env),
    cycle: {
      quota: env.MAX_VIDEOS_PER_RUN,
      maxLines: env.SUMMARY_MAX_LINES,
      summarizeRetryBudget: env.SUMMARIZE_RETRY_BUDGET,
      stageTimeoutMs: env.STAGE_TIMEOUT_MS,
      initialLookbackHours: env.INITIAL_LOOKBACK_HOURS,
    },
    governor,
    transcript: {
      lang: env.TRANSCRIPT_LANG,
    },
    trigger: {
      port: env.TRIGGER_PORT,
      secret: env.TRIGGER_SECRET,
    },
    digest: {
      outputPath: env.DIGEST_OUTPUT_PATH,
    },
  };
}
