import { describe, it, expect, vi } from 'vitest';

// ── Hoisted SDK mocks ────────────────────────────────────────────────────────

const { mockCreate, MockOpenAI, mockGenerateContent, MockGoogleGenAI } = vi.hoisted(() => {
  const mockCreate = vi.fn();
  const MockOpenAI = vi.fn(function () {
    return { chat: { completions: { create: mockCreate } } };
  });
  const mockGenerateContent = vi.fn();
  const MockGoogleGenAI = vi.fn(function () {
    return { models: { generateContent: mockGenerateContent } };
  });
  return { mockCreate, MockOpenAI, mockGenerateContent, MockGoogleGenAI };
});

vi.mock('openai', () => ({ default: MockOpenAI }));
vi.mock('@google/genai', () => ({ GoogleGenAI: MockGoogleGenAI }));

import { DEFAULT_MODELS, GROQ_BASE_URL } from '../api/analysis.config.js';
import { AnalysisError } from '../api/lib/errors.js';
import {
  calculateCost,
  createProvider,
  GeminiProvider,
  OpenAIProvider,
  ProviderRegistry,
  Semaphore,
} from '../api/lib/providers/index.js';
import { createSuggestionSource, UnavailableSuggestionSource } from '../api/lib/suggestions/index.js';
import { withTimeout } from '../api/lib/timeout.js';

function chatCompletion(content: string, model = 'gpt-4o-mini') {
  return {
    model,
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 1000, completion_tokens: 1000, total_tokens: 2000 },
  };
}

const baseConfig = { apiKey: 'test-key', maxConcurrent: 2, defaultModel: 'gpt-4o-mini', timeout: 5000 };

// ─── OpenAI-compatible ───────────────────────────────────────────────────────

describe('OpenAIProvider', () => {
  it('sends a chat completion and prices the usage', async () => {
    mockCreate.mockResolvedValueOnce(chatCompletion('Hello'));
    const provider = new OpenAIProvider(baseConfig);

    const result = await provider.generateContent({
      prompt: 'Hi',
      options: { systemInstruction: 'Be brief', temperature: 0.2, maxTokens: 100 },
    });

    expect(MockOpenAI).toHaveBeenCalledWith({ apiKey: 'test-key', baseURL: undefined, maxRetries: 0, timeout: 5000 });
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Hi' },
      ],
      temperature: 0.2,
      max_tokens: 100,
    });
    expect(result.text).toBe('Hello');
    expect(result.provider).toBe('openai');
    expect(result.usage).toEqual({ promptTokens: 1000, completionTokens: 1000, totalTokens: 2000 });
    expect(result.cost).toBeCloseTo(0.00075);
  });

  it('points Groq at its OpenAI-compatible endpoint', () => {
    const provider = createProvider('groq', { apiKey: 'test-key' });

    expect(provider.name).toBe('groq');
    expect(provider.getDefaultModel()).toBe(DEFAULT_MODELS.groq);
    expect(MockOpenAI).toHaveBeenCalledWith(expect.objectContaining({ baseURL: GROQ_BASE_URL }));
  });

  it('wraps SDK failures in an API error', async () => {
    mockCreate.mockRejectedValueOnce(new Error('429 Too Many Requests'));
    const provider = new OpenAIProvider(baseConfig);

    await expect(provider.generateContent({ prompt: 'Hi' })).rejects.toMatchObject({
      code: 'API_ERROR',
      message: 'openai request failed',
      details: '429 Too Many Requests',
    });
    expect(provider.getConcurrencyUsage()).toEqual({ active: 0, max: 2 });
  });

  it('is unavailable without a key', async () => {
    const provider = new OpenAIProvider({ ...baseConfig, apiKey: '' });
    expect(provider.isAvailable()).toBe(false);
    await expect(provider.generateContent({ prompt: 'Hi' })).rejects.toBeInstanceOf(AnalysisError);
  });
});

// ─── Gemini ──────────────────────────────────────────────────────────────────

describe('GeminiProvider', () => {
  it('maps options onto the generation config', async () => {
    mockGenerateContent.mockResolvedValueOnce({
      text: 'Use shorter titles',
      usageMetadata: { promptTokenCount: 10, candidatesTokenCount: 5, totalTokenCount: 15 },
    });
    const provider = new GeminiProvider({ ...baseConfig, defaultModel: 'gemini-2.0-flash' });

    const result = await provider.generateContent({ prompt: 'Hi', options: { temperature: 0.5, maxTokens: 64 } });

    expect(mockGenerateContent).toHaveBeenCalledWith({
      model: 'gemini-2.0-flash',
      contents: 'Hi',
      config: { systemInstruction: undefined, temperature: 0.5, maxOutputTokens: 64 },
    });
    expect(result).toMatchObject({ text: 'Use shorter titles', provider: 'gemini', model: 'gemini-2.0-flash' });
    expect(result.usage?.totalTokens).toBe(15);
  });
});

// ─── Registry ────────────────────────────────────────────────────────────────

describe('ProviderRegistry', () => {
  it('registers only providers with keys', () => {
    const registry = new ProviderRegistry({ gemini: { apiKey: 'test-key' } });
    expect(registry.getAvailableProviders()).toEqual(['gemini']);
    expect(registry.getDefaultProvider()?.name).toBe('gemini');
    expect(registry.hasProvider('openai')).toBe(false);
  });

  it('honours the requested default provider', () => {
    const registry = new ProviderRegistry({
      openai: { apiKey: 'test-key' },
      groq: { apiKey: 'test-key' },
      defaultProvider: 'groq',
    });
    expect(registry.getDefaultProvider()?.name).toBe('groq');
  });

  it('falls back to the next provider without the pinned model', async () => {
    mockCreate.mockRejectedValueOnce(new Error('boom'));
    mockGenerateContent.mockResolvedValueOnce({ text: 'From Gemini' });
    const registry = new ProviderRegistry({
      openai: { apiKey: 'test-key' },
      gemini: { apiKey: 'test-key' },
      defaultProvider: 'openai',
    });

    const result = await registry.generate({ prompt: 'Hi', options: { model: 'gpt-4o' } });

    expect(result.provider).toBe('gemini');
    expect(result.model).toBe(DEFAULT_MODELS.gemini);
    expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'gpt-4o' }));
  });

  it('rethrows the first failure when fallback is off', async () => {
    mockCreate.mockRejectedValueOnce(new Error('boom'));
    const registry = new ProviderRegistry({
      openai: { apiKey: 'test-key' },
      gemini: { apiKey: 'test-key' },
      enableFallback: false,
    });

    await expect(registry.generate({ prompt: 'Hi' })).rejects.toMatchObject({ code: 'API_ERROR' });
    expect(mockGenerateContent).not.toHaveBeenCalled();
  });

  it('refuses to generate with no providers', async () => {
    const registry = new ProviderRegistry();
    expect(registry.getDefaultProvider()).toBeNull();
    await expect(registry.generate({ prompt: 'Hi' })).rejects.toThrow('No providers available');
  });
});

// ─── Suggestion sources ──────────────────────────────────────────────────────

describe('createSuggestionSource', () => {
  it('is unavailable without any key', () => {
    const source = createSuggestionSource({ providers: {} });
    expect(source).toBeInstanceOf(UnavailableSuggestionSource);
    expect(source.available).toBe(false);
  });

  it('uses the preferred provider and model', async () => {
    mockCreate.mockResolvedValueOnce(chatCompletion('- Add FAQ schema', 'llama-3.3-70b-versatile'));
    const source = createSuggestionSource({
      providers: { groq: 'test-key', gemini: 'test-key' },
      llmProvider: 'groq',
      llmModel: 'llama-3.3-70b-versatile',
    });

    expect(source.available).toBe(true);
    expect(source.provider).toBe('groq');
    expect(source.model).toBe('llama-3.3-70b-versatile');

    const response = await source.suggest({ label: 'Site Analysis', prompt: 'Hi' });
    expect(response).toMatchObject({ text: '- Add FAQ schema', provider: 'groq', model: 'llama-3.3-70b-versatile' });
  });

  it('resolves null for empty or failed answers', async () => {
    const source = createSuggestionSource({ providers: { openai: 'test-key' } });

    mockCreate.mockResolvedValueOnce(chatCompletion('   '));
    expect(await source.suggest({ label: 'Site Analysis', prompt: 'Hi' })).toBeNull();

    mockCreate.mockRejectedValueOnce(new Error('boom'));
    expect(await source.suggest({ label: 'Site Analysis', prompt: 'Hi' })).toBeNull();
  });
});

// ─── Helpers ─────────────────────────────────────────────────────────────────

describe('calculateCost', () => {
  it('uses a default rate for unknown models', () => {
    expect(calculateCost('mystery-model', 1000, 1000)).toBeCloseTo(0.003);
  });
});

describe('Semaphore', () => {
  it('queues callers beyond its permits', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();

    let acquired = false;
    const waiting = semaphore.acquire().then(() => {
      acquired = true;
    });
    await Promise.resolve();
    expect(acquired).toBe(false);

    semaphore.release();
    await waiting;
    expect(acquired).toBe(true);
  });
});

describe('withTimeout', () => {
  it('rejects with a timeout error when the promise is too slow', async () => {
    const never = new Promise<string>(() => {});
    await expect(withTimeout(never, 10, 'slow call')).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Timeout: slow call exceeded 10ms',
    });
  });

  it('passes through a fast result', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'fast call')).resolves.toBe('done');
  });
});
