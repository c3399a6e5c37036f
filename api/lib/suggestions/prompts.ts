/**
 * Prompt Helpers
 *
 * Template interpolation and the variable sets each suggestion step fills in.
 */

import { assessContent, assessSpeed } from '../assessors/index.js';
import { HEADING_LEVELS, type KeywordMetric, type MetricsRecord } from '../types.js';

export type PromptVariables = Record<string, string | number | boolean | null | undefined>;

/**
 * Replace {{name}} placeholders. Missing or null values render as N/A.
 */
export function interpolatePrompt(template: string, variables: PromptVariables): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_, key: string) => {
    const value = variables[key];
    if (value === null || value === undefined) {
      return 'N/A';
    }
    return String(value);
  });
}

export function formatHeadingsForPrompt(record: MetricsRecord): string {
  const lines = HEADING_LEVELS.filter((level) => record.headings[level] > 0).map(
    (level) => `- ${level.toUpperCase()}: ${record.headings[level]} headings`
  );
  return lines.length > 0 ? lines.join('\n') : 'No heading structure detected';
}

export function formatCompetitorsForPrompt(competitors: MetricsRecord[]): string {
  if (competitors.length === 0) return 'None';
  return competitors
    .map(
      (c, i) =>
        `Competitor ${i + 1}:\n- Load Time: ${c.loadTime}s\n- Word Count: ${c.wordCount}\n- Mobile Friendly: ${c.mobileFriendly}`
    )
    .join('\n');
}

export function formatKeywordsForPrompt(keywords: KeywordMetric[]): string {
  if (keywords.length === 0) return 'None';
  return keywords
    .map((k) => `- ${k.keyword}: ${k.searchVolume === 'unknown' ? 'N/A' : k.searchVolume} searches`)
    .join('\n');
}

export interface PromptContext {
  site: MetricsRecord;
  competitors: MetricsRecord[];
  keywords: KeywordMetric[];
}

/**
 * Every variable the built-in templates reference. Stored templates may use
 * any subset.
 */
export function buildPromptVariables({ site, competitors, keywords }: PromptContext): PromptVariables {
  const speed = assessSpeed(site);
  const content = assessContent(site);

  return {
    url: site.url,
    title: site.title,
    metaDescription: site.metaDescription,
    loadTime: speed.loadTime,
    performanceGrade: speed.grade,
    qualityScore: content.qualityScore,
    wordCount: content.wordCount,
    hasMetaDescription: content.hasMetaDescription,
    hasTitle: content.hasTitle,
    mobileFriendly: site.mobileFriendly,
    hasSsl: site.hasSsl,
    imageCount: site.imageCount,
    internalLinks: site.internalLinks,
    externalLinks: site.externalLinks,
    hasCanonical: site.hasCanonical,
    hasOpenGraph: site.hasOpenGraph,
    hasSchema: site.hasSchema,
    hasGzip: site.hasGzip,
    headings: formatHeadingsForPrompt(site),
    competitors: formatCompetitorsForPrompt(competitors),
    keywords: formatKeywordsForPrompt(keywords),
  };
}
