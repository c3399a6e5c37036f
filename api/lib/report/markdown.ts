/**
 * Markdown Report Renderer
 *
 * Mirrors the HTML report's sections for pasting into tickets and docs.
 */

import type { AnalysisRun, Insight } from '../types.js';
import {
  describeInsight,
  formatPercent,
  formatScore,
  formatVolume,
  pageMetricRows,
  REPORT_TITLE,
  type ReportOptions,
} from './model.js';

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function table(headers: string[], rows: string[][]): string[] {
  return [
    `| ${headers.join(' | ')} |`,
    `| ${headers.map(() => '---').join(' | ')} |`,
    ...rows.map((row) => `| ${row.map(escapeCell).join(' | ')} |`),
  ];
}

function insightBlock(insight: Insight): string[] {
  return [
    `#### ${insight.issue}`,
    '',
    `**Recommendation:** ${insight.recommendation}`,
    '',
    `_${insight.category} · ${describeInsight(insight)}_`,
    '',
  ];
}

function insightSection(title: string, insights: Insight[], emptyMessage: string): string[] {
  const lines = [`## ${title}`, ''];
  if (insights.length === 0) {
    return [...lines, emptyMessage, ''];
  }
  return [...lines, ...insights.flatMap(insightBlock)];
}

export function renderMarkdownReport(run: AnalysisRun, options: ReportOptions): string {
  const { sections, branding } = options;
  const { analysis, summary } = run;
  const lines: string[] = [];

  lines.push(`# ${REPORT_TITLE}`, '');
  if (branding.companyName) lines.push(`**${branding.companyName}**`, '');
  lines.push(`- URL: ${run.site.url}`, `- Generated: ${run.generatedAt}`);
  if (branding.preparedFor) lines.push(`- Prepared for: ${branding.preparedFor}`);
  lines.push('');
  if (branding.notes) lines.push(branding.notes, '');

  if (sections.executiveSummary) {
    lines.push(
      '## Executive Summary',
      '',
      `- Overall SEO score: ${formatScore(analysis.overallScore)}`,
      `- Total insights: ${summary.totalInsights}`,
      `- High priority issues: ${summary.highPriorityCount}`,
      `- Average confidence: ${formatPercent(summary.averageConfidence)}`,
      `- Quick wins: ${summary.quickWins.length}`,
      ''
    );
    if (analysis.priorityRecommendations.length > 0) {
      lines.push('### Priority Recommendations', '');
      analysis.priorityRecommendations.forEach((recommendation, i) => {
        lines.push(`${i + 1}. ${recommendation}`);
      });
      lines.push('');
    }
    if (run.errors.length > 0) {
      lines.push('### Data Gaps', '');
      for (const error of run.errors) {
        lines.push(`- ${error.collector} (${error.target}): ${error.message}`);
      }
      lines.push('');
    }
  }

  if (sections.immediateActions) {
    lines.push(
      ...insightSection(
        'Immediate Actions (0-30 days)',
        analysis.actionPlan.immediate,
        'No high-priority issues found.'
      )
    );
  }

  if (sections.shortTermGoals) {
    lines.push(
      ...insightSection(
        'Short-term Optimization Goals (1-3 months)',
        analysis.actionPlan.short_term,
        'No medium-priority issues found.'
      )
    );
    if (analysis.actionPlan.short_term.length > 0) {
      lines.push('### Suggested Monthly Breakdown', '');
      summary.monthlyFocus.forEach((month, i) => {
        const focus =
          month.length > 0 ? month.map((insight) => insight.issue).join('; ') : 'Review progress and measure results';
        lines.push(`${i + 1}. **Month ${i + 1} Focus:** ${focus}`);
      });
      lines.push('');
    }
  }

  if (sections.longTermStrategy) {
    lines.push(
      ...insightSection(
        'Long-term SEO Strategy (3-12 months)',
        analysis.actionPlan.long_term,
        'No low-priority issues found.'
      )
    );
  }

  if (sections.detailedInsights) {
    lines.push('## Detailed Insights', '');
    const categories = Object.entries(summary.byCategory);
    if (categories.length === 0) {
      lines.push('No issues found.', '');
    }
    for (const [category, insights] of categories) {
      lines.push(`### ${category}`, '', ...insights.flatMap(insightBlock));
    }
  }

  if (sections.technicalData) {
    lines.push('## Technical Data', '', '### Page Metrics', '');
    if (run.site.error) {
      lines.push(`Page could not be measured: ${run.site.error}`, '');
    } else {
      lines.push(...table(['Metric', 'Value'], pageMetricRows(run.site)), '');
    }

    if (run.competitors.length > 0) {
      lines.push(
        '### Competitors',
        '',
        ...table(
          ['URL', 'Load time', 'Word count'],
          run.competitors.map((c) =>
            c.error ? [c.url, 'N/A', 'N/A'] : [c.url, `${c.loadTime}s`, String(c.wordCount)]
          )
        ),
        ''
      );
    }

    if (run.keywords.length > 0) {
      lines.push(
        '### Keywords',
        '',
        ...table(
          ['Keyword', 'Volume', 'Difficulty', 'CPC', 'Source'],
          run.keywords.map((k) => [
            k.keyword,
            formatVolume(k.searchVolume),
            String(k.difficulty),
            `$${k.cpc.toFixed(2)}`,
            k.source,
          ])
        ),
        ''
      );
      if (run.keywordSuggestions.length > 0) {
        lines.push(`**Suggested keywords:** ${run.keywordSuggestions.join(', ')}`, '');
      }
    }
  }

  if (sections.tips) {
    lines.push('## SEO Tips', '');
    if (run.tips.length === 0) {
      lines.push('No tips for this page.');
    }
    for (const tip of run.tips) {
      lines.push(`- ${tip}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
