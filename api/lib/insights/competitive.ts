/**
 * Competitive Insight Generator
 *
 * Compares the subject against competitor means. Thresholds are ratios so the
 * rules hold regardless of scale.
 */

import { COMPETITOR_CONTENT_RATIO, COMPETITOR_LOAD_TIME_RATIO } from '../../analysis.config.js';
import { createInsight } from '../records.js';
import type { Insight, MetricsRecord } from '../types.js';

export interface CompetitorBenchmark {
  averageLoadTime: number;
  averageWordCount: number;
  competitorCount: number;
}

export function benchmarkCompetitors(competitors: MetricsRecord[]): CompetitorBenchmark | null {
  if (competitors.length === 0) {
    return null;
  }

  const totalLoadTime = competitors.reduce((sum, c) => sum + (c.loadTime || 0), 0);
  const totalWords = competitors.reduce((sum, c) => sum + (c.wordCount || 0), 0);

  return {
    averageLoadTime: totalLoadTime / competitors.length,
    averageWordCount: totalWords / competitors.length,
    competitorCount: competitors.length,
  };
}

export function generateCompetitiveInsights(
  site: MetricsRecord,
  competitors: MetricsRecord[]
): Insight[] {
  const benchmark = benchmarkCompetitors(competitors);
  if (!benchmark) {
    return [];
  }

  const insights: Insight[] = [];
  const siteLoadTime = site.loadTime || 0;
  const siteWords = site.wordCount || 0;

  if (siteLoadTime > benchmark.averageLoadTime * COMPETITOR_LOAD_TIME_RATIO) {
    const gap = siteLoadTime - benchmark.averageLoadTime;
    insights.push(
      createInsight({
        category: 'Competitive Analysis',
        priority: 'High',
        issue: `Your site loads ${gap.toFixed(1)}s slower than competitor average`,
        recommendation: `Prioritize performance optimization to match competitor speed (target: ${benchmark.averageLoadTime.toFixed(1)}s)`,
        impactScore: 8.0,
        effort: 'Medium',
        confidence: 0.92,
      })
    );
  }

  if (siteWords < benchmark.averageWordCount * COMPETITOR_CONTENT_RATIO) {
    const gap = benchmark.averageWordCount - siteWords;
    insights.push(
      createInsight({
        category: 'Content Strategy',
        priority: 'Medium',
        issue: `Your content is ${gap.toFixed(0)} words shorter than competitor average`,
        recommendation: `Expand content depth to match competitors (target: ${benchmark.averageWordCount.toFixed(0)}+ words)`,
        impactScore: 7.2,
        effort: 'High',
        confidence: 0.88,
      })
    );
  }

  return insights;
}
