/**
 * Gemini Provider
 *
 * Wrapper for Google's Gemini API with semaphore-based rate limiting.
 */

import { GoogleGenAI, type GenerateContentConfig } from '@google/genai';
import { AnalysisError, getErrorMessage, isAnalysisError } from '../errors.js';
import { withTimeout } from '../timeout.js';
import type {
  Provider,
  ProviderConfig,
  GenerateRequest,
  GenerateResult,
  UsageMetadata,
} from './types.js';
import { calculateCost, Semaphore } from './types.js';

export class GeminiProvider implements Provider {
  readonly name = 'gemini' as const;
  private client: GoogleGenAI | null = null;
  private config: ProviderConfig;
  private semaphore: Semaphore;

  constructor(config: ProviderConfig) {
    this.config = config;
    this.semaphore = new Semaphore(config.maxConcurrent);

    if (config.apiKey) {
      this.client = new GoogleGenAI({ apiKey: config.apiKey });
    }
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  getDefaultModel(): string {
    return this.config.defaultModel;
  }

  getConcurrencyUsage(): { active: number; max: number } {
    return {
      active: this.semaphore.getActive(),
      max: this.semaphore.getMax(),
    };
  }

  async generateContent(request: GenerateRequest): Promise<GenerateResult> {
    const client = this.client;
    if (!client) {
      throw AnalysisError.configError('Gemini provider not initialized (missing API key)');
    }

    const startTime = Date.now();
    const model = request.options?.model || this.config.defaultModel;

    await this.semaphore.acquire();

    try {
      const generationConfig: GenerateContentConfig = {
        systemInstruction: request.options?.systemInstruction,
      };

      if (request.options?.temperature !== undefined) {
        generationConfig.temperature = request.options.temperature;
      }

      if (request.options?.maxTokens !== undefined) {
        generationConfig.maxOutputTokens = request.options.maxTokens;
      }

      const response = await withTimeout(
        client.models.generateContent({
          model,
          contents: request.prompt,
          config: generationConfig,
        }),
        this.config.timeout,
        'Gemini text generation'
      );

      const usage: UsageMetadata = {
        promptTokens: response.usageMetadata?.promptTokenCount || 0,
        completionTokens: response.usageMetadata?.candidatesTokenCount || 0,
        totalTokens: response.usageMetadata?.totalTokenCount || 0,
      };

      return {
        text: response.text || '',
        usage,
        model,
        durationMs: Date.now() - startTime,
        cost: calculateCost(model, usage.promptTokens, usage.completionTokens),
        provider: 'gemini',
      };
    } catch (err) {
      if (isAnalysisError(err)) {
        throw err;
      }
      throw AnalysisError.apiError('gemini request failed', getErrorMessage(err));
    } finally {
      this.semaphore.release();
    }
  }
}
