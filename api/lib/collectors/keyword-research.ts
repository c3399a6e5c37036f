/**
 * Keyword Research Helpers
 *
 * Related-keyword expansion, cross-keyword suggestions and summary figures.
 * Word lists live in api/data/keyword-lexicon.json.
 */

import { z } from 'zod';
import lexiconData from '../../data/keyword-lexicon.json' with { type: 'json' };
import type { KeywordMetric, KeywordSummary } from '../types.js';

const LexiconSchema = z.object({
  modifiers: z.object({
    question: z.array(z.string()).min(1),
    commercial: z.array(z.string()).min(1),
    local: z.array(z.string()).min(1),
    longTail: z.array(z.string()).min(1),
  }),
  synonyms: z.record(z.array(z.string())),
  industryTerms: z.record(z.array(z.string())),
});

export type KeywordLexicon = z.infer<typeof LexiconSchema>;

export const KEYWORD_LEXICON: KeywordLexicon = LexiconSchema.parse(lexiconData);

export const MAX_RELATED_KEYWORDS = 8;
export const MAX_SYNONYM_VARIANTS = 3;
export const MODIFIERS_PER_FAMILY = 2;
export const MAX_SUGGESTIONS = 10;
export const INDUSTRY_TERMS_PER_MATCH = 3;

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

// ============================================================================
// Related Keywords
// ============================================================================

export function synonymVariants(keyword: string, lexicon: KeywordLexicon = KEYWORD_LEXICON): string[] {
  const base = keyword.toLowerCase();
  const variants: string[] = [];

  for (const [word, synonyms] of Object.entries(lexicon.synonyms)) {
    if (!base.includes(word)) continue;
    for (const synonym of synonyms) {
      variants.push(base.split(word).join(synonym));
    }
  }

  return variants;
}

export function pluralVariant(keyword: string): string | null {
  const base = keyword.toLowerCase();
  if (!base.endsWith('s')) return `${base}s`;
  if (base.length > 3) return base.slice(0, -1);
  return null;
}

/**
 * Two variants per modifier family, then synonym swaps, then the
 * plural/singular form. The modifiers alone fill the cap unless some
 * collapse as duplicates.
 */
export function generateRelatedKeywords(
  keyword: string,
  lexicon: KeywordLexicon = KEYWORD_LEXICON
): string[] {
  const base = keyword.trim().toLowerCase();
  if (!base) return [];

  const { question, commercial, local, longTail } = lexicon.modifiers;
  const take = (modifiers: string[]) => modifiers.slice(0, MODIFIERS_PER_FAMILY);
  const related = [
    ...take(question).map((modifier) => `${modifier} ${base}`),
    ...take(commercial).map((modifier) => `${modifier} ${base}`),
    ...take(local).map((modifier) => `${base} ${modifier}`),
    ...take(longTail).map((modifier) => `${modifier} ${base}`),
    ...synonymVariants(base, lexicon).slice(0, MAX_SYNONYM_VARIANTS),
  ];

  const plural = pluralVariant(base);
  if (plural) related.push(plural);

  return unique(related)
    .filter((candidate) => candidate !== base)
    .slice(0, MAX_RELATED_KEYWORDS);
}

// ============================================================================
// Suggestions
// ============================================================================

export function industryKeywords(keyword: string, lexicon: KeywordLexicon = KEYWORD_LEXICON): string[] {
  const base = keyword.toLowerCase();
  const terms: string[] = [];
  for (const [industry, industryTerms] of Object.entries(lexicon.industryTerms)) {
    if (base.includes(industry)) {
      terms.push(...industryTerms.slice(0, INDUSTRY_TERMS_PER_MATCH));
    }
  }
  return terms;
}

/**
 * Pairwise combinations in both orders, then industry terms; first-seen order
 */
export function generateKeywordSuggestions(
  keywords: string[],
  lexicon: KeywordLexicon = KEYWORD_LEXICON
): string[] {
  const suggestions: string[] = [];

  for (let i = 0; i < keywords.length; i++) {
    for (let j = i + 1; j < keywords.length; j++) {
      suggestions.push(`${keywords[i]} ${keywords[j]}`);
      suggestions.push(`${keywords[j]} ${keywords[i]}`);
    }
  }

  for (const keyword of keywords) {
    suggestions.push(...industryKeywords(keyword, lexicon));
  }

  return unique(suggestions).slice(0, MAX_SUGGESTIONS);
}

// ============================================================================
// Summary
// ============================================================================

function average(values: number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

/**
 * Null when there are no keywords. Volume figures cover numeric volumes only.
 */
export function summarizeKeywords(metrics: KeywordMetric[]): KeywordSummary | null {
  if (metrics.length === 0) return null;

  const volumes = metrics.flatMap((m) => (typeof m.searchVolume === 'number' ? [m.searchVolume] : []));
  const difficulties = metrics.map((m) => m.difficulty);

  return {
    totalKeywords: metrics.length,
    averageVolume: average(volumes),
    maxVolume: volumes.length > 0 ? Math.max(...volumes) : 0,
    minVolume: volumes.length > 0 ? Math.min(...volumes) : 0,
    averageDifficulty: average(difficulties),
    averageCpc: average(metrics.map((m) => m.cpc)),
    opportunityCount: difficulties.filter((d) => d < 40).length,
    competitiveCount: difficulties.filter((d) => d > 70).length,
  };
}
