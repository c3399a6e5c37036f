/**
 * Keyword Metrics Collector
 *
 * Looks each keyword up at the keyword provider when a key is configured.
 * Without a key, or whenever a lookup fails, the keyword gets simulated
 * figures seeded from its own text, so repeated runs agree.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { KEYWORD_PROVIDER_URL, TIMEOUT_KEYWORD_PROVIDER } from '../../analysis.config.js';
import { AnalysisError, getErrorMessage } from '../errors.js';
import { fetchWithTimeout } from '../fetchers.js';
import { logger } from '../logger.js';
import { createKeywordMetric } from '../records.js';
import type { KeywordMetric } from '../types.js';
import { generateRelatedKeywords } from './keyword-research.js';

export interface KeywordFetchOptions {
  apiKey?: string;
  /** Per-keyword timeout in ms */
  timeout?: number;
  endpoint?: string;
}

export interface KeywordFetchResult {
  metrics: KeywordMetric[];
  /** One message per keyword that fell back to simulated figures */
  errors: Array<{ keyword: string; message: string }>;
}

// ============================================================================
// Simulation
// ============================================================================

/**
 * mulberry32 over a 32-bit seed
 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function seedFor(keyword: string): number {
  return createHash('sha256').update(keyword.trim().toLowerCase()).digest().readUInt32BE(0);
}

function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function baseVolumeFor(keyword: string): number {
  const words = keyword.trim().split(/\s+/).filter(Boolean).length;
  if (words <= 1) return 10000;
  if (words === 2) return 5000;
  return 2000;
}

/**
 * Deterministic stand-in figures.
 * Volume: base by word count +/- 50%, at least 100.
 * Difficulty: 20-90, 20 lower (floor 10) beyond two words.
 * CPC: 0.25-4.50.
 */
export function simulateKeywordMetric(keyword: string): KeywordMetric {
  const random = seededRandom(seedFor(keyword));
  const base = baseVolumeFor(keyword);
  const words = keyword.trim().split(/\s+/).filter(Boolean).length;

  const half = Math.floor(base / 2);
  const volume = Math.max(100, base + randomInt(random, -half, half));

  let difficulty = randomInt(random, 20, 90);
  if (words > 2) {
    difficulty = Math.max(10, difficulty - 20);
  }

  const cpc = Math.round((0.25 + random() * 4.25) * 100) / 100;

  return createKeywordMetric({
    keyword,
    searchVolume: volume,
    difficulty,
    cpc,
    relatedKeywords: generateRelatedKeywords(keyword),
    source: 'simulated',
  });
}

// ============================================================================
// Provider Lookup
// ============================================================================

const ProviderResponseSchema = z.object({
  searchVolume: z.number().nonnegative().nullable().optional(),
  relatedKeywords: z.array(z.string()).optional(),
  difficulty: z.number().min(0).max(100).optional(),
  cpc: z.number().nonnegative().optional(),
});

async function lookupKeyword(
  keyword: string,
  apiKey: string,
  timeout: number,
  endpoint: string
): Promise<KeywordMetric> {
  const response = await fetchWithTimeout(endpoint, {
    method: 'POST',
    timeout,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({ query: keyword, type: 'keyword', includeMetrics: true }),
  });

  if (!response.ok) {
    throw AnalysisError.httpStatus(endpoint, response.status);
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (err) {
    throw AnalysisError.parseError('Keyword provider returned invalid JSON', getErrorMessage(err));
  }

  const parsed = ProviderResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw AnalysisError.parseError('Unexpected keyword provider response', parsed.error.message);
  }

  // Fields the provider leaves out are filled from the simulation
  const fallback = simulateKeywordMetric(keyword);
  const data = parsed.data;

  return createKeywordMetric({
    keyword,
    searchVolume: data.searchVolume === null ? 'unknown' : data.searchVolume ?? fallback.searchVolume,
    difficulty: data.difficulty ?? fallback.difficulty,
    cpc: data.cpc ?? fallback.cpc,
    relatedKeywords: data.relatedKeywords?.length ? data.relatedKeywords : fallback.relatedKeywords,
    source: 'provider',
  });
}

// ============================================================================
// Main Entry
// ============================================================================

export function normalizeKeywords(keywords: string[]): string[] {
  return Array.from(new Set(keywords.map((k) => k.trim()).filter(Boolean)));
}

/**
 * One KeywordMetric per distinct keyword, in input order. Never rejects.
 */
export async function fetchKeywordMetrics(
  keywords: string[],
  options: KeywordFetchOptions = {}
): Promise<KeywordFetchResult> {
  const list = normalizeKeywords(keywords);
  const { apiKey, timeout = TIMEOUT_KEYWORD_PROVIDER, endpoint = KEYWORD_PROVIDER_URL } = options;

  if (!apiKey) {
    if (list.length > 0) {
      logger.info('Keywords', `No keyword provider key, simulating ${list.length} keyword(s)`);
    }
    return { metrics: list.map(simulateKeywordMetric), errors: [] };
  }

  const outcomes = await Promise.all(
    list.map(async (keyword) => {
      try {
        return { metric: await lookupKeyword(keyword, apiKey, timeout, endpoint), error: null };
      } catch (err) {
        const message = getErrorMessage(err);
        logger.warn('Keywords', `Lookup failed for "${keyword}", using simulated figures: ${message}`);
        return { metric: simulateKeywordMetric(keyword), error: { keyword, message } };
      }
    })
  );

  const metrics = outcomes.map((outcome) => outcome.metric);
  const errors = outcomes.flatMap((outcome) => (outcome.error ? [outcome.error] : []));

  logger.info('Keywords', `Fetched metrics for ${metrics.length} keyword(s)`);
  return { metrics, errors };
}
