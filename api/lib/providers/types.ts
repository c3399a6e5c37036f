/**
 * Provider Types
 *
 * Shared interfaces for multi-provider LLM support (OpenAI, Groq, Gemini).
 */

// ============================================================================
// Core Provider Interfaces
// ============================================================================

export const PROVIDER_NAMES = ['openai', 'groq', 'gemini'] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface ProviderConfig {
  /** API key for the provider */
  apiKey: string;
  /** Maximum concurrent calls (semaphore limit) */
  maxConcurrent: number;
  /** Default model to use */
  defaultModel: string;
  /** Request timeout in ms */
  timeout: number;
}

export interface GenerateOptions {
  /** Model to use (overrides default) */
  model?: string;
  /** System instruction/prompt */
  systemInstruction?: string;
  /** Temperature for generation */
  temperature?: number;
  /** Max output tokens */
  maxTokens?: number;
}

export interface GenerateRequest {
  /** Text prompt */
  prompt: string;
  /** Generation options */
  options?: GenerateOptions;
}

export interface UsageMetadata {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface GenerateResult {
  /** Generated text content */
  text: string;
  usage?: UsageMetadata;
  /** Model used */
  model: string;
  durationMs: number;
  /** Estimated cost in USD */
  cost: number;
  /** Provider that handled the request */
  provider: ProviderName;
}

export interface Provider {
  name: ProviderName;

  /** Generate content from a prompt */
  generateContent(request: GenerateRequest): Promise<GenerateResult>;

  /** Check if provider is available (has API key) */
  isAvailable(): boolean;

  /** Get current concurrency usage */
  getConcurrencyUsage(): { active: number; max: number };

  /** Model used when a request names none */
  getDefaultModel(): string;
}

// ============================================================================
// Provider-Specific Types
// ============================================================================

export interface OpenAICompatibleConfig extends ProviderConfig {
  /** Endpoint override for OpenAI-compatible APIs */
  baseURL?: string;
}

// ============================================================================
// Pricing
// ============================================================================

export interface ModelPricing {
  inputPer1k: number;
  outputPer1k: number;
}

export const MODEL_PRICING: Record<string, ModelPricing> = {
  // Gemini models
  'gemini-2.0-flash': { inputPer1k: 0.0001, outputPer1k: 0.0004 },
  'gemini-2.5-flash': { inputPer1k: 0.0003, outputPer1k: 0.0025 },

  // OpenAI models
  'gpt-4o': { inputPer1k: 0.0025, outputPer1k: 0.01 },
  'gpt-4o-mini': { inputPer1k: 0.00015, outputPer1k: 0.0006 },

  // Groq-hosted models
  'llama-3.1-8b-instant': { inputPer1k: 0.00005, outputPer1k: 0.00008 },
  'llama-3.3-70b-versatile': { inputPer1k: 0.00059, outputPer1k: 0.00079 },
};

export function calculateCost(
  model: string,
  inputTokens: number,
  outputTokens: number
): number {
  const pricing = MODEL_PRICING[model] || { inputPer1k: 0.001, outputPer1k: 0.002 };
  return (inputTokens / 1000) * pricing.inputPer1k + (outputTokens / 1000) * pricing.outputPer1k;
}

// ============================================================================
// Semaphore for Rate Limiting
// ============================================================================

export class Semaphore {
  private permits: number;
  private maxPermits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = permits;
    this.maxPermits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    if (this.waiting.length > 0) {
      const next = this.waiting.shift();
      next?.();
    } else {
      this.permits++;
    }
  }

  getActive(): number {
    return this.maxPermits - this.permits + this.waiting.length;
  }

  getMax(): number {
    return this.maxPermits;
  }
}
