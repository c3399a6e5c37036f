/**
 * Insight Generators
 *
 * Runs the rule engines over collected data. Pure and synchronous; a missing
 * input simply yields an empty group.
 */

import type { InsightGroups, KeywordMetric, MetricsRecord } from '../types.js';
import { generateSiteInsights } from './site.js';
import { generateCompetitiveInsights } from './competitive.js';
import { generateKeywordInsights } from './keyword.js';

export { generateSiteInsights } from './site.js';
export { generateCompetitiveInsights, benchmarkCompetitors, type CompetitorBenchmark } from './competitive.js';
export { generateKeywordInsights, partitionByVolume, type KeywordInsightInput, type VolumePartition } from './keyword.js';

export interface GeneratorInput {
  site: MetricsRecord;
  competitors: MetricsRecord[];
  keywords: KeywordMetric[];
}

export function runInsightGenerators(input: GeneratorInput): InsightGroups {
  return {
    site: generateSiteInsights(input.site),
    competitive: generateCompetitiveInsights(input.site, input.competitors),
    keyword: generateKeywordInsights({ keywords: input.keywords, site: input.site }),
  };
}
