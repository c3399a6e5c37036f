import React from 'react';
import type { AnalysisSummary, Insight } from '../api/lib/types.js';
import { InsightList } from './InsightCard.js';

interface HorizonSectionProps {
  insights: Insight[];
}

export const ImmediateActions: React.FC<HorizonSectionProps> = ({ insights }) => (
  <section id="immediate-actions">
    <h2>Immediate Actions (0-30 days)</h2>
    <InsightList insights={insights} emptyMessage="No high-priority issues found." />
  </section>
);

interface ShortTermGoalsProps extends HorizonSectionProps {
  monthlyFocus: AnalysisSummary['monthlyFocus'];
}

export const ShortTermGoals: React.FC<ShortTermGoalsProps> = ({ insights, monthlyFocus }) => (
  <section id="short-term-goals">
    <h2>Short-term Optimization Goals (1-3 months)</h2>
    <InsightList insights={insights} emptyMessage="No medium-priority issues found." />
    {insights.length > 0 && (
      <div className="monthly">
        <h3>Suggested Monthly Breakdown</h3>
        <ol>
          {monthlyFocus.map((month, i) => (
            <li key={i}>
              <strong>Month {i + 1} Focus:</strong>{' '}
              {month.length > 0 ? month.map((insight) => insight.issue).join('; ') : 'Review progress and measure results'}
            </li>
          ))}
        </ol>
      </div>
    )}
  </section>
);

export const LongTermStrategy: React.FC<HorizonSectionProps> = ({ insights }) => (
  <section id="long-term-strategy">
    <h2>Long-term SEO Strategy (3-12 months)</h2>
    <InsightList insights={insights} emptyMessage="No low-priority issues found." />
  </section>
);
