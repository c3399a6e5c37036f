/**
 * Suggestion Sources
 *
 * Capability-gated access to a language model. Callers depend only on the
 * SuggestionSource interface and never learn which variant is active.
 */

import { TIMEOUT_LLM } from '../../analysis.config.js';
import { AnalysisError, getErrorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { ProviderRegistry, type ProviderName } from '../providers/index.js';
import type { AnalysisSettings } from '../settings.js';
import { withTimeout } from '../timeout.js';

export interface SuggestionRequest {
  /** Label used in logs */
  label: string;
  prompt: string;
  systemInstruction?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-call timeout in ms */
  timeout?: number;
}

export interface SuggestionResponse {
  text: string;
  provider: ProviderName;
  model: string;
  cost: number;
  durationMs: number;
}

export interface SuggestionSource {
  readonly available: boolean;
  readonly provider: ProviderName | null;
  readonly model: string | null;
  /** Resolves null on any failure; never rejects */
  suggest(request: SuggestionRequest): Promise<SuggestionResponse | null>;
}

// ============================================================================
// Available
// ============================================================================

export class AvailableSuggestionSource implements SuggestionSource {
  readonly available = true;
  readonly provider: ProviderName;
  readonly model: string;
  private registry: ProviderRegistry;

  constructor(registry: ProviderRegistry) {
    const primary = registry.getDefaultProvider();
    if (!primary) {
      throw AnalysisError.configError('No language model provider configured');
    }
    this.registry = registry;
    this.provider = primary.name;
    this.model = primary.getDefaultModel();
  }

  async suggest(request: SuggestionRequest): Promise<SuggestionResponse | null> {
    const timeout = request.timeout ?? TIMEOUT_LLM;

    try {
      const result = await withTimeout(
        this.registry.generate({
          prompt: request.prompt,
          options: {
            model: request.model || undefined,
            systemInstruction: request.systemInstruction,
            temperature: request.temperature,
            maxTokens: request.maxTokens,
          },
        }),
        timeout,
        `${request.label} suggestions`
      );

      if (!result.text.trim()) {
        logger.warn('Suggestions', `${request.label}: empty response from ${result.provider}`);
        return null;
      }

      logger.debug('Suggestions', `${request.label}: ${result.provider} answered`, {
        model: result.model,
        durationMs: result.durationMs,
      });

      return {
        text: result.text,
        provider: result.provider,
        model: result.model,
        cost: result.cost,
        durationMs: result.durationMs,
      };
    } catch (err) {
      logger.warn('Suggestions', `${request.label}: ${getErrorMessage(err)}`);
      return null;
    }
  }
}

// ============================================================================
// Unavailable
// ============================================================================

export class UnavailableSuggestionSource implements SuggestionSource {
  readonly available = false;
  readonly provider = null;
  readonly model = null;

  async suggest(): Promise<SuggestionResponse | null> {
    return null;
  }
}

/**
 * Pick the variant from the configured credentials. No key means the model
 * is never called.
 */
export function createSuggestionSource(settings: AnalysisSettings): SuggestionSource {
  const preferred = settings.llmProvider;
  const credentials = (name: ProviderName) => {
    const apiKey = settings.providers[name];
    if (!apiKey) return undefined;
    return { apiKey, model: name === preferred ? settings.llmModel : undefined };
  };

  const registry = new ProviderRegistry({
    openai: credentials('openai'),
    groq: credentials('groq'),
    gemini: credentials('gemini'),
    defaultProvider: preferred,
  });

  if (registry.getAvailableProviders().length === 0) {
    return new UnavailableSuggestionSource();
  }
  return new AvailableSuggestionSource(registry);
}
