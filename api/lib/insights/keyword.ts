/**
 * Keyword Insight Generator
 *
 * Partitions keywords by numeric search volume. Keywords without a numeric
 * volume are left out of both partitions.
 */

import { HIGH_VOLUME_THRESHOLD, MAX_LISTED_KEYWORDS, MEDIUM_VOLUME_MIN } from '../../analysis.config.js';
import { createInsight } from '../records.js';
import type { Insight, KeywordMetric, MetricsRecord } from '../types.js';

export interface KeywordInsightInput {
  keywords: KeywordMetric[];
  /** Subject page; used when prompting a model about the same keywords */
  site: MetricsRecord;
}

export interface VolumePartition {
  high: KeywordMetric[];
  medium: KeywordMetric[];
}

export function partitionByVolume(keywords: KeywordMetric[]): VolumePartition {
  const high: KeywordMetric[] = [];
  const medium: KeywordMetric[] = [];

  for (const keyword of keywords) {
    const volume = keyword.searchVolume;
    if (typeof volume !== 'number') continue;

    if (volume > HIGH_VOLUME_THRESHOLD) {
      high.push(keyword);
    } else if (volume >= MEDIUM_VOLUME_MIN) {
      medium.push(keyword);
    }
  }

  return { high, medium };
}

export function generateKeywordInsights({ keywords }: KeywordInsightInput): Insight[] {
  if (keywords.length === 0) {
    return [];
  }

  const insights: Insight[] = [];
  const { high, medium } = partitionByVolume(keywords);

  if (high.length > 0) {
    const topKeywords = high
      .slice(0, MAX_LISTED_KEYWORDS)
      .map((k) => k.keyword)
      .join(', ');
    insights.push(
      createInsight({
        category: 'Keyword Strategy',
        priority: 'High',
        issue: `Found ${high.length} high-volume keyword opportunities`,
        recommendation: `Target these high-impact keywords: ${topKeywords}. Optimize title tags, headings, and content.`,
        impactScore: 8.5,
        effort: 'Medium',
        confidence: 0.85,
      })
    );
  }

  if (medium.length > 0) {
    insights.push(
      createInsight({
        category: 'Long-tail Strategy',
        priority: 'Medium',
        issue: `Identified ${medium.length} medium-volume long-tail opportunities`,
        recommendation:
          'Create dedicated content pieces targeting these long-tail keywords for easier ranking',
        impactScore: 6.8,
        effort: 'High',
        confidence: 0.8,
      })
    );
  }

  return insights;
}
