/**
 * Report Model
 *
 * Section toggles, branding and the small formatting helpers shared by the
 * HTML and Markdown renderers.
 */

import { HEADING_LEVELS, type AnalysisRun, type Insight, type MetricsRecord } from '../types.js';
import { extractHostname } from '../url.js';

export const REPORT_FORMATS = ['html', 'markdown', 'json'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface ReportSections {
  executiveSummary: boolean;
  immediateActions: boolean;
  shortTermGoals: boolean;
  longTermStrategy: boolean;
  detailedInsights: boolean;
  technicalData: boolean;
  tips: boolean;
}

export interface ReportBranding {
  /** Shown in the report header */
  companyName?: string;
  preparedFor?: string;
  notes?: string;
}

export interface ReportConfig {
  format: ReportFormat;
  /** Omitted sections default to enabled */
  sections?: Partial<ReportSections>;
  branding?: ReportBranding;
}

export interface ReportOptions {
  sections: ReportSections;
  branding: ReportBranding;
}

export const ALL_SECTIONS: ReportSections = {
  executiveSummary: true,
  immediateActions: true,
  shortTermGoals: true,
  longTermStrategy: true,
  detailedInsights: true,
  technicalData: true,
  tips: true,
};

export function resolveReportOptions(config: ReportConfig): ReportOptions {
  return {
    sections: { ...ALL_SECTIONS, ...config.sections },
    branding: config.branding ?? {},
  };
}

export const REPORT_TITLE = 'SEO Analysis Report';

// ============================================================================
// Formatting
// ============================================================================

export function formatScore(score: number): string {
  return `${score.toFixed(1)}/100`;
}

export function formatPercent(ratio: number | null): string {
  return ratio === null ? 'N/A' : `${(ratio * 100).toFixed(0)}%`;
}

export function formatVolume(volume: number | 'unknown'): string {
  return volume === 'unknown' ? 'N/A' : volume.toLocaleString('en-US');
}

export function formatFlag(value: boolean): string {
  return value ? 'Yes' : 'No';
}

export function describeInsight(insight: Insight): string {
  return `${insight.priority} priority · impact ${insight.impactScore.toFixed(1)}/10 · ${insight.effort} effort · ${formatPercent(insight.confidence)} confidence`;
}

/**
 * Label/value rows for the page metrics table
 */
export function pageMetricRows(record: MetricsRecord): Array<[string, string]> {
  return [
    ['Status code', String(record.statusCode)],
    ['Load time', `${record.loadTime}s`],
    ['Word count', String(record.wordCount)],
    ['Title', record.title ?? 'Missing'],
    ['Meta description', record.metaDescription ?? 'Missing'],
    ['Headings', HEADING_LEVELS.map((level) => `${level.toUpperCase()}: ${record.headings[level]}`).join(', ')],
    ['Images (missing alt)', `${record.imageCount} (${record.imagesMissingAlt})`],
    ['Internal / external links', `${record.internalLinks} / ${record.externalLinks}`],
    ['Mobile viewport', formatFlag(record.mobileFriendly)],
    ['HTTPS', formatFlag(record.hasSsl)],
    ['Canonical', record.canonicalUrl ?? formatFlag(record.hasCanonical)],
    ['Structured data', formatFlag(record.hasSchema)],
    ['Open Graph', formatFlag(record.hasOpenGraph)],
    ['Twitter card', formatFlag(record.hasTwitterCard)],
    ['Gzip', formatFlag(record.hasGzip)],
    ['Robots meta', record.robotsMeta ?? 'Not set'],
  ];
}

/**
 * SEO_Analysis_Report_<domain>_<yyyymmdd_hhmmss>.<ext>
 */
export function reportFilename(run: AnalysisRun, format: ReportFormat): string {
  const domain = (extractHostname(run.site.url) ?? 'website').replace(/[^a-z0-9.-]/gi, '_');
  const stamp = run.generatedAt.replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  const extension = format === 'markdown' ? 'md' : format;
  return `SEO_Analysis_Report_${domain}_${stamp}.${extension}`;
}
