/**
 * OpenAI Provider
 *
 * Chat completions through the OpenAI SDK with semaphore-based rate limiting.
 * Also serves Groq, whose API is OpenAI-compatible, via a base URL override.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { AnalysisError, getErrorMessage, isAnalysisError } from '../errors.js';
import { withTimeout } from '../timeout.js';
import type {
  Provider,
  OpenAICompatibleConfig,
  GenerateRequest,
  GenerateResult,
  UsageMetadata,
} from './types.js';
import { calculateCost, Semaphore } from './types.js';

export class OpenAIProvider implements Provider {
  readonly name: 'openai' | 'groq';
  private client: OpenAI | null = null;
  private config: OpenAICompatibleConfig;
  private semaphore: Semaphore;

  constructor(config: OpenAICompatibleConfig, name: 'openai' | 'groq' = 'openai') {
    this.name = name;
    this.config = config;
    this.semaphore = new Semaphore(config.maxConcurrent);

    if (config.apiKey) {
      this.client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        maxRetries: 0,
        timeout: config.timeout,
      });
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
      throw AnalysisError.configError(`${this.name} provider not initialized (missing API key)`);
    }

    const startTime = Date.now();
    const model = request.options?.model || this.config.defaultModel;

    await this.semaphore.acquire();

    try {
      const messages: ChatCompletionMessageParam[] = [];
      if (request.options?.systemInstruction) {
        messages.push({ role: 'system', content: request.options.systemInstruction });
      }
      messages.push({ role: 'user', content: request.prompt });

      const response = await withTimeout(
        client.chat.completions.create({
          model,
          messages,
          temperature: request.options?.temperature,
          max_tokens: request.options?.maxTokens,
        }),
        this.config.timeout,
        `${this.name} text generation`
      );

      const text = response.choices[0]?.message?.content || '';

      const usage: UsageMetadata = {
        promptTokens: response.usage?.prompt_tokens || 0,
        completionTokens: response.usage?.completion_tokens || 0,
        totalTokens: response.usage?.total_tokens || 0,
      };

      return {
        text,
        usage,
        model: response.model || model,
        durationMs: Date.now() - startTime,
        cost: calculateCost(model, usage.promptTokens, usage.completionTokens),
        provider: this.name,
      };
    } catch (err) {
      if (isAnalysisError(err)) {
        throw err;
      }
      throw AnalysisError.apiError(`${this.name} request failed`, getErrorMessage(err));
    } finally {
      this.semaphore.release();
    }
  }
}
