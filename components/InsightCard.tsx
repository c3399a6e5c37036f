import React from 'react';
import type { Insight } from '../api/lib/types.js';
import { describeInsight } from '../api/lib/report/model.js';

interface InsightCardProps {
  insight: Insight;
}

export const InsightCard: React.FC<InsightCardProps> = ({ insight }) => (
  <article className={`insight insight-${insight.priority.toLowerCase()}`}>
    <header>
      <span className="badge">{insight.priority}</span>
      <span className="category">{insight.category}</span>
    </header>
    <h4>{insight.issue}</h4>
    <p className="recommendation">
      <strong>Recommendation:</strong> {insight.recommendation}
    </p>
    <p className="meta">{describeInsight(insight)}</p>
  </article>
);

interface InsightListProps {
  insights: Insight[];
  /** Shown when the list is empty */
  emptyMessage: string;
}

export const InsightList: React.FC<InsightListProps> = ({ insights, emptyMessage }) => {
  if (insights.length === 0) {
    return <p className="empty">{emptyMessage}</p>;
  }
  return (
    <div className="insight-list">
      {insights.map((insight, i) => (
        <InsightCard key={`${insight.category}-${i}`} insight={insight} />
      ))}
    </div>
  );
};
