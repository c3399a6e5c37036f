/**
 * Site Insight Generator
 *
 * Four independent checks over the subject page. Any combination may fire.
 */

import { assessContent, assessSpeed } from '../assessors/index.js';
import { createInsight } from '../records.js';
import type { Insight, MetricsRecord } from '../types.js';

export function generateSiteInsights(record: MetricsRecord): Insight[] {
  const insights: Insight[] = [];
  const speed = assessSpeed(record);
  const content = assessContent(record);

  if (speed.needsOptimization) {
    const severe = speed.severity === 'high';
    insights.push(
      createInsight({
        category: 'Technical SEO',
        priority: severe ? 'High' : 'Medium',
        issue: `Page load time is ${speed.loadTime} seconds (${speed.grade} grade)`,
        recommendation:
          'Optimize images, enable gzip compression, use CDN, minimize HTTP requests, and leverage browser caching',
        impactScore: severe ? 8.5 : 6.5,
        effort: 'Medium',
        confidence: 0.95,
      })
    );
  }

  if (content.qualityScore < 60) {
    insights.push(
      createInsight({
        category: 'Content Quality',
        priority: content.qualityScore < 40 ? 'High' : 'Medium',
        issue: `Content quality score is ${content.qualityScore}/100`,
        recommendation:
          'Improve content depth, add more comprehensive information, optimize headings structure, and ensure proper keyword usage',
        impactScore: 7.8,
        effort: 'High',
        confidence: 0.9,
      })
    );
  }

  if (!content.hasMetaDescription) {
    insights.push(
      createInsight({
        category: 'On-Page SEO',
        priority: 'Medium',
        issue: 'Missing meta description',
        recommendation:
          'Add compelling meta descriptions (150-160 characters) that include target keywords and encourage clicks',
        impactScore: 6.5,
        effort: 'Low',
        confidence: 0.98,
      })
    );
  }

  if (!content.hasTitle) {
    insights.push(
      createInsight({
        category: 'On-Page SEO',
        priority: 'High',
        issue: 'Missing or inadequate title tag',
        recommendation:
          'Create unique, descriptive title tags (50-60 characters) with primary keywords near the beginning',
        impactScore: 9.0,
        effort: 'Low',
        confidence: 0.99,
      })
    );
  }

  return insights;
}
