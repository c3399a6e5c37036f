/**
 * Provider Registry & Factory
 *
 * Central hub for multi-provider LLM access.
 * Handles provider selection and fallback. Credentials arrive through the
 * registry config; nothing here reads the environment.
 */

import {
  DEFAULT_MODELS,
  GROQ_BASE_URL,
  LLM_MAX_CONCURRENT,
  TIMEOUT_LLM,
} from '../../analysis.config.js';
import { AnalysisError } from '../errors.js';
import { logger } from '../logger.js';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';
import {
  PROVIDER_NAMES,
  type Provider,
  type ProviderName,
  type GenerateRequest,
  type GenerateResult,
} from './types.js';

export * from './types.js';
export { GeminiProvider } from './gemini.js';
export { OpenAIProvider } from './openai.js';

// ============================================================================
// Provider Registry
// ============================================================================

export interface ProviderCredentials {
  apiKey: string;
  /** Model used when a request names none */
  model?: string;
}

export interface ProviderRegistryConfig {
  openai?: ProviderCredentials;
  groq?: ProviderCredentials;
  gemini?: ProviderCredentials;
  /** Default provider for requests */
  defaultProvider?: ProviderName;
  /** Try the other providers when the primary fails */
  enableFallback?: boolean;
  /** Per-call timeout in ms */
  timeout?: number;
}

export function createProvider(
  name: ProviderName,
  credentials: ProviderCredentials,
  timeout: number = TIMEOUT_LLM
): Provider {
  const base = {
    apiKey: credentials.apiKey,
    maxConcurrent: LLM_MAX_CONCURRENT,
    defaultModel: credentials.model || DEFAULT_MODELS[name],
    timeout,
  };

  switch (name) {
    case 'openai':
      return new OpenAIProvider(base, 'openai');
    case 'groq':
      return new OpenAIProvider({ ...base, baseURL: GROQ_BASE_URL }, 'groq');
    case 'gemini':
      return new GeminiProvider(base);
  }
}

export class ProviderRegistry {
  private providers: Map<ProviderName, Provider> = new Map();
  private defaultProvider: ProviderName | null;
  private enableFallback: boolean;

  constructor(config: ProviderRegistryConfig = {}) {
    this.enableFallback = config.enableFallback ?? true;

    for (const name of PROVIDER_NAMES) {
      const credentials = config[name];
      if (!credentials?.apiKey) continue;

      const provider = createProvider(name, credentials, config.timeout);
      if (provider.isAvailable()) {
        this.providers.set(name, provider);
      }
    }

    const requested = config.defaultProvider;
    if (requested && this.providers.has(requested)) {
      this.defaultProvider = requested;
    } else {
      this.defaultProvider = this.getAvailableProviders()[0] ?? null;
    }
  }

  getProvider(name: ProviderName): Provider | undefined {
    return this.providers.get(name);
  }

  hasProvider(name: ProviderName): boolean {
    return this.providers.get(name)?.isAvailable() ?? false;
  }

  /**
   * Get list of available providers, in preference order
   */
  getAvailableProviders(): ProviderName[] {
    return PROVIDER_NAMES.filter((name) => this.hasProvider(name));
  }

  /**
   * Provider used when a request names none (null when nothing is configured)
   */
  getDefaultProvider(): Provider | null {
    return this.defaultProvider ? this.providers.get(this.defaultProvider) ?? null : null;
  }

  /**
   * Generate content with automatic provider selection and fallback
   */
  async generate(
    request: GenerateRequest,
    preferredProvider?: ProviderName
  ): Promise<GenerateResult> {
    const primary = preferredProvider || this.defaultProvider;
    if (!primary) {
      throw AnalysisError.configError('No providers available');
    }

    let lastError: Error | null = null;

    for (const providerName of this.getProviderOrder(primary)) {
      const provider = this.providers.get(providerName);
      if (!provider || !provider.isAvailable()) {
        continue;
      }

      try {
        // A model pinned for the primary provider means nothing to the others
        const attempt =
          providerName === primary
            ? request
            : { ...request, options: { ...request.options, model: undefined } };
        return await provider.generateContent(attempt);
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        logger.warn('Providers', `Provider ${providerName} failed: ${lastError.message}`);

        if (!this.enableFallback) {
          throw lastError;
        }
      }
    }

    throw lastError || AnalysisError.configError(`Provider ${primary} not available`);
  }

  private getProviderOrder(primary: ProviderName): ProviderName[] {
    return [primary, ...PROVIDER_NAMES.filter((p) => p !== primary)];
  }
}
