import React from 'react';
import type { AnalysisRun } from '../api/lib/types.js';
import {
  formatPercent,
  formatScore,
  REPORT_TITLE,
  type ReportOptions,
} from '../api/lib/report/model.js';
import { ImmediateActions, LongTermStrategy, ShortTermGoals } from './ActionPlanSection.js';
import { InsightList } from './InsightCard.js';
import { ScoreGauge } from './ScoreGauge.js';
import { TechnicalDataSection } from './TechnicalDataSection.js';

const STYLES = `
body { font-family: system-ui, -apple-system, sans-serif; color: #111; max-width: 960px; margin: 0 auto; padding: 32px; line-height: 1.5; }
header.report h1 { margin-bottom: 4px; }
.muted, .meta { color: #6b7280; font-size: 0.875rem; }
.overview { display: flex; gap: 32px; align-items: center; }
.gauge { margin: 0; text-align: center; }
.gauge-value { font-size: 28px; font-weight: 700; }
.gauge figcaption { font-size: 0.75rem; text-transform: uppercase; letter-spacing: 0.1em; color: #9ca3af; }
.insight { border: 1px solid #e5e7eb; border-radius: 16px; padding: 16px 20px; margin-bottom: 12px; }
.insight-high { border-left: 4px solid #ef4444; }
.insight-medium { border-left: 4px solid #f59e0b; }
.insight-low { border-left: 4px solid #3b82f6; }
.badge { font-size: 0.7rem; font-weight: 700; text-transform: uppercase; margin-right: 8px; }
.category { font-size: 0.75rem; color: #6b7280; }
table { border-collapse: collapse; width: 100%; margin-bottom: 16px; }
th, td { text-align: left; border-bottom: 1px solid #f3f4f6; padding: 6px 8px; font-size: 0.875rem; }
.empty { color: #6b7280; font-style: italic; }
@media print { body { padding: 0; } .insight { break-inside: avoid; } }
`;

interface ReportDocumentProps {
  run: AnalysisRun;
  options: ReportOptions;
}

export const ReportDocument: React.FC<ReportDocumentProps> = ({ run, options }) => {
  const { sections, branding } = options;
  const { analysis, summary } = run;

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{`${REPORT_TITLE}: ${run.site.url}`}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>
        <header className="report">
          {branding.companyName && <p className="muted">{branding.companyName}</p>}
          <h1>{REPORT_TITLE}</h1>
          <p className="muted">
            {run.site.url} · Generated {run.generatedAt}
            {branding.preparedFor && <> · Prepared for {branding.preparedFor}</>}
          </p>
          {branding.notes && <p>{branding.notes}</p>}
        </header>

        {sections.executiveSummary && (
          <section id="executive-summary">
            <h2>Executive Summary</h2>
            <div className="overview">
              <ScoreGauge score={analysis.overallScore} label="SEO Score" />
              <ul>
                <li>Overall SEO score: {formatScore(analysis.overallScore)}</li>
                <li>Total insights: {summary.totalInsights}</li>
                <li>High priority issues: {summary.highPriorityCount}</li>
                <li>Average confidence: {formatPercent(summary.averageConfidence)}</li>
                <li>Quick wins: {summary.quickWins.length}</li>
              </ul>
            </div>
            {analysis.priorityRecommendations.length > 0 && (
              <>
                <h3>Priority Recommendations</h3>
                <ol>
                  {analysis.priorityRecommendations.map((recommendation, i) => (
                    <li key={i}>{recommendation}</li>
                  ))}
                </ol>
              </>
            )}
            {run.errors.length > 0 && (
              <>
                <h3>Data Gaps</h3>
                <ul>
                  {run.errors.map((error, i) => (
                    <li key={i}>
                      {error.collector} ({error.target}): {error.message}
                    </li>
                  ))}
                </ul>
              </>
            )}
          </section>
        )}

        {sections.immediateActions && <ImmediateActions insights={analysis.actionPlan.immediate} />}
        {sections.shortTermGoals && (
          <ShortTermGoals insights={analysis.actionPlan.short_term} monthlyFocus={summary.monthlyFocus} />
        )}
        {sections.longTermStrategy && <LongTermStrategy insights={analysis.actionPlan.long_term} />}

        {sections.detailedInsights && (
          <section id="detailed-insights">
            <h2>Detailed Insights</h2>
            {Object.keys(summary.byCategory).length === 0 ? (
              <p className="empty">No issues found.</p>
            ) : (
              Object.entries(summary.byCategory).map(([category, insights]) => (
                <div key={category}>
                  <h3>{category}</h3>
                  <InsightList insights={insights} emptyMessage="No issues found." />
                </div>
              ))
            )}
          </section>
        )}

        {sections.technicalData && <TechnicalDataSection run={run} />}

        {sections.tips && (
          <section id="tips">
            <h2>SEO Tips</h2>
            {run.tips.length === 0 ? (
              <p className="empty">No tips for this page.</p>
            ) : (
              <ul>
                {run.tips.map((tip, i) => (
                  <li key={i}>{tip}</li>
                ))}
              </ul>
            )}
            <p className="meta">
              {run.suggestions.available
                ? `AI suggestions: ${run.suggestions.provider ?? 'unknown'} (${run.suggestions.model ?? 'default'})`
                : 'AI suggestions unavailable; rule-based tips only'}
            </p>
          </section>
        )}
      </body>
    </html>
  );
};
