/**
 * Record Factories
 *
 * The only way records enter the pipeline. Defaults are applied here so
 * consumers never deal with missing fields.
 */

import { z } from 'zod';
import { AnalysisError } from './errors.js';
import {
  EFFORTS,
  HEADING_LEVELS,
  PRIORITIES,
  type HeadingCounts,
  type Insight,
  type KeywordMetric,
  type MetricsRecord,
} from './types.js';

// ============================================================================
// Metrics Records
// ============================================================================

export function emptyHeadings(): HeadingCounts {
  return { h1: 0, h2: 0, h3: 0, h4: 0, h5: 0, h6: 0 };
}

function nonNegative(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Build a frozen MetricsRecord from whatever the crawl produced
 */
export function createMetricsRecord(
  input: Partial<MetricsRecord> & { url: string }
): MetricsRecord {
  const headings = emptyHeadings();
  for (const level of HEADING_LEVELS) {
    headings[level] = Math.floor(nonNegative(input.headings?.[level]));
  }

  const record: MetricsRecord = {
    url: input.url,
    statusCode: input.statusCode ?? 0,
    loadTime: nonNegative(input.loadTime),
    wordCount: Math.floor(nonNegative(input.wordCount)),
    title: input.title || null,
    metaDescription: input.metaDescription || null,
    metaKeywords: input.metaKeywords || null,
    headings: Object.freeze(headings),
    imageCount: nonNegative(input.imageCount),
    imagesMissingAlt: nonNegative(input.imagesMissingAlt),
    internalLinks: nonNegative(input.internalLinks),
    externalLinks: nonNegative(input.externalLinks),
    mobileFriendly: input.mobileFriendly ?? false,
    hasSsl: input.hasSsl ?? false,
    hasSchema: input.hasSchema ?? false,
    hasCanonical: input.hasCanonical ?? false,
    canonicalUrl: input.canonicalUrl || null,
    hasOpenGraph: input.hasOpenGraph ?? false,
    hasTwitterCard: input.hasTwitterCard ?? false,
    hasGzip: input.hasGzip ?? false,
    cacheControl: input.cacheControl || null,
    server: input.server || null,
    robotsMeta: input.robotsMeta || null,
    contentLength: nonNegative(input.contentLength),
  };

  if (input.error) {
    record.error = input.error;
  }

  return Object.freeze(record);
}

/**
 * Record for a page that could not be measured
 */
export function createErrorMetricsRecord(url: string, error: string): MetricsRecord {
  return createMetricsRecord({ url, error });
}

// ============================================================================
// Keyword Metrics
// ============================================================================

export function createKeywordMetric(
  input: Partial<KeywordMetric> & { keyword: string }
): KeywordMetric {
  const volume = input.searchVolume;
  const metric: KeywordMetric = {
    keyword: input.keyword,
    searchVolume:
      typeof volume === 'number' && Number.isFinite(volume) && volume >= 0
        ? Math.round(volume)
        : 'unknown',
    difficulty: Math.min(100, nonNegative(input.difficulty)),
    cpc: nonNegative(input.cpc),
    relatedKeywords: [...(input.relatedKeywords ?? [])],
    source: input.source ?? 'simulated',
  };
  return Object.freeze(metric);
}

// ============================================================================
// Insights
// ============================================================================

export const InsightSchema = z.object({
  category: z.string().min(1),
  priority: z.enum(PRIORITIES),
  issue: z.string().min(1),
  recommendation: z.string().min(1),
  impactScore: z.number().min(0).max(10),
  effort: z.enum(EFFORTS),
  confidence: z.number().min(0).max(1),
});

/**
 * Validate and freeze an Insight.
 * Throws CONTRACT_VIOLATION for anything outside the closed enums or ranges.
 */
export function createInsight(input: Insight): Insight {
  const parsed = InsightSchema.safeParse(input);
  if (!parsed.success) {
    throw AnalysisError.contractViolation(
      'Invalid insight',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    );
  }
  return Object.freeze(parsed.data);
}
