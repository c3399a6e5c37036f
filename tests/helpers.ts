import { createInsight, createKeywordMetric, createMetricsRecord } from '../api/lib/records.js';
import type { AnalysisRun, Insight, KeywordMetric, MetricsRecord } from '../api/lib/types.js';
import { aggregateInsights, summarizeAnalysis } from '../api/lib/synthesis/index.js';

// ─── Fixtures ────────────────────────────────────────────────────────────────

/**
 * A page that trips none of the site rules
 */
export function makeRecord(overrides: Partial<MetricsRecord> = {}): MetricsRecord {
  return createMetricsRecord({
    url: 'https://example.com/',
    statusCode: 200,
    loadTime: 1.2,
    wordCount: 900,
    title: 'Example Widgets for Testing',
    metaDescription: 'Hand-made widgets for the test suite',
    headings: { h1: 1, h2: 3, h3: 0, h4: 0, h5: 0, h6: 0 },
    imageCount: 4,
    imagesMissingAlt: 0,
    internalLinks: 12,
    externalLinks: 3,
    mobileFriendly: true,
    hasSsl: true,
    hasSchema: true,
    hasCanonical: true,
    canonicalUrl: 'https://example.com/',
    hasOpenGraph: true,
    hasTwitterCard: true,
    hasGzip: true,
    ...overrides,
  });
}

export function makeInsight(overrides: Partial<Insight> = {}): Insight {
  return createInsight({
    category: 'Technical SEO',
    priority: 'Medium',
    issue: 'Test issue',
    recommendation: 'Test recommendation',
    impactScore: 5,
    effort: 'Medium',
    confidence: 0.9,
    ...overrides,
  });
}

export function makeKeyword(keyword: string, searchVolume: number | 'unknown', overrides: Partial<KeywordMetric> = {}): KeywordMetric {
  return createKeywordMetric({
    keyword,
    searchVolume,
    difficulty: 50,
    cpc: 1.5,
    source: 'simulated',
    ...overrides,
  });
}

/**
 * A finished run around the given site record, with no model configured
 */
export function makeRun(overrides: Partial<AnalysisRun> = {}): AnalysisRun {
  const site = overrides.site ?? makeRecord();
  const analysis = aggregateInsights({
    site: [
      makeInsight({ priority: 'High', issue: 'Missing or inadequate title tag', recommendation: 'Write a title', impactScore: 9 }),
      makeInsight({ priority: 'Medium', issue: 'Missing meta description', recommendation: 'Write a description', impactScore: 5, effort: 'Low' }),
    ],
    competitive: [],
    keyword: [],
  });

  return {
    analysis,
    summary: summarizeAnalysis(analysis),
    site,
    competitors: [],
    keywords: [],
    keywordSummary: null,
    keywordSuggestions: [],
    tips: ['Add a single H1 tag with primary keywords'],
    suggestions: { available: false, provider: null, model: null, calls: 0, failures: 0, cost: 0 },
    errors: [],
    generatedAt: '2026-03-04T05:06:07.000Z',
    durationMs: 42,
    ...overrides,
  };
}
