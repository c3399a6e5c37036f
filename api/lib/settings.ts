/**
 * Analysis Settings
 *
 * Credentials and runtime options for one run. Built once from the
 * environment (or by hand in tests) and passed explicitly to each
 * collaborator.
 */

import { z } from 'zod';
import { AnalysisError } from './errors.js';
import type { LogLevel } from './logger.js';
import { PROVIDER_NAMES, type ProviderName } from './providers/types.js';

export interface AnalysisSettings {
  /** Language model API keys; a provider without a key is never called */
  providers: Partial<Record<ProviderName, string>>;
  /** Preferred provider when more than one key is set */
  llmProvider?: ProviderName;
  /** Model override for the preferred provider */
  llmModel?: string;
  /** Keyword research provider key; absent means simulated keyword data */
  keywordApiKey?: string;
  /** Upstash REST credentials for the stored suggestion profile */
  redis?: { url: string; token: string };
  logLevel?: LogLevel;
}

// ============================================================================
// Environment Schema
// ============================================================================

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function normalizeEnumValue(value: unknown): unknown {
  const cleaned = blankToUndefined(value);
  return typeof cleaned === 'string' ? cleaned.trim().toLowerCase() : cleaned;
}

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  GROQ_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  KEYWORD_API_KEY: optionalString,
  LLM_PROVIDER: z.preprocess(normalizeEnumValue, z.enum(PROVIDER_NAMES).optional()),
  LLM_MODEL: optionalString,
  UPSTASH_REDIS_REST_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  UPSTASH_REDIS_REST_TOKEN: optionalString,
  LOG_LEVEL: z.preprocess(normalizeEnumValue, z.enum(['debug', 'info', 'warn', 'error']).optional()),
});

export type Env = Record<string, string | undefined>;

/**
 * Read settings from environment variables.
 * Throws CONFIG_ERROR when a variable is present but malformed.
 */
export function loadSettings(env: Env = process.env): AnalysisSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw AnalysisError.configError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    );
  }

  const vars = parsed.data;
  const providers: Partial<Record<ProviderName, string>> = {};
  if (vars.OPENAI_API_KEY) providers.openai = vars.OPENAI_API_KEY;
  if (vars.GROQ_API_KEY) providers.groq = vars.GROQ_API_KEY;
  if (vars.GEMINI_API_KEY) providers.gemini = vars.GEMINI_API_KEY;

  const settings: AnalysisSettings = { providers };
  if (vars.LLM_PROVIDER) settings.llmProvider = vars.LLM_PROVIDER;
  if (vars.LLM_MODEL) settings.llmModel = vars.LLM_MODEL;
  if (vars.KEYWORD_API_KEY) settings.keywordApiKey = vars.KEYWORD_API_KEY;
  if (vars.LOG_LEVEL) settings.logLevel = vars.LOG_LEVEL;

  if (vars.UPSTASH_REDIS_REST_URL && vars.UPSTASH_REDIS_REST_TOKEN) {
    settings.redis = { url: vars.UPSTASH_REDIS_REST_URL, token: vars.UPSTASH_REDIS_REST_TOKEN };
  }

  return settings;
}

/**
 * Copy of the settings with every language model key removed
 */
export function withoutLanguageModels(settings: AnalysisSettings): AnalysisSettings {
  return { ...settings, providers: {} };
}
