/**
 * Collector Orchestrator
 *
 * Runs the subject fetch, every competitor fetch and the keyword lookup in
 * parallel. No LLM calls; each collector resolves with a degraded value
 * instead of rejecting.
 */

import type { CollectorError, KeywordMetric, MetricsRecord } from '../types.js';
import { fetchKeywordMetrics } from './keywords.js';
import { fetchPageMetrics } from './page.js';

export { fetchPageMetrics, type PageFetchOptions } from './page.js';
export {
  fetchKeywordMetrics,
  simulateKeywordMetric,
  normalizeKeywords,
  baseVolumeFor,
  type KeywordFetchOptions,
  type KeywordFetchResult,
} from './keywords.js';
export * from './keyword-research.js';

/**
 * Swappable I/O boundary; tests pass fakes
 */
export interface Collectors {
  fetchPage(url: string, options: { timeout: number }): Promise<MetricsRecord>;
  fetchKeywords(
    keywords: string[],
    options: { apiKey?: string; timeout: number }
  ): Promise<{ metrics: KeywordMetric[]; errors: Array<{ keyword: string; message: string }> }>;
}

export const defaultCollectors: Collectors = {
  fetchPage: fetchPageMetrics,
  fetchKeywords: fetchKeywordMetrics,
};

export interface CollectRequest {
  url: string;
  competitors: string[];
  keywords: string[];
  keywordApiKey?: string;
  timeout: number;
}

export interface CollectResult {
  site: MetricsRecord;
  competitors: MetricsRecord[];
  keywords: KeywordMetric[];
  errors: CollectorError[];
}

export async function collectAll(
  request: CollectRequest,
  collectors: Collectors = defaultCollectors
): Promise<CollectResult> {
  const options = { timeout: request.timeout };

  const [site, competitors, keywordResult] = await Promise.all([
    collectors.fetchPage(request.url, options),
    Promise.all(request.competitors.map((url) => collectors.fetchPage(url, options))),
    request.keywords.length > 0
      ? collectors.fetchKeywords(request.keywords, { apiKey: request.keywordApiKey, timeout: request.timeout })
      : Promise.resolve({ metrics: [], errors: [] }),
  ]);

  const errors: CollectorError[] = [];
  if (site.error) {
    errors.push({ collector: 'page', target: site.url, message: site.error });
  }
  for (const competitor of competitors) {
    if (competitor.error) {
      errors.push({ collector: 'competitor', target: competitor.url, message: competitor.error });
    }
  }
  for (const failure of keywordResult.errors) {
    errors.push({ collector: 'keywords', target: failure.keyword, message: failure.message });
  }

  return { site, competitors, keywords: keywordResult.metrics, errors };
}
