/**
 * Analysis Summary
 *
 * Report-level figures derived from an AnalysisResult.
 */

import { type AnalysisResult, type AnalysisSummary, type Insight, type Priority } from '../types.js';
import { rankInsights } from './ranker.js';

export function allInsights(result: AnalysisResult): Insight[] {
  return [...result.siteInsights, ...result.competitiveInsights, ...result.keywordInsights];
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Spread the short-term bucket over three months
 */
export function planMonthlyFocus(shortTerm: Insight[]): [Insight[], Insight[], Insight[]] {
  const month1 = shortTerm.filter((i) => i.effort === 'Low' || i.effort === 'Medium').slice(0, 2);
  const mediumEffort = shortTerm.filter((i) => i.effort === 'Medium');
  const month2 = mediumEffort.length > 2 ? mediumEffort.slice(2, 4) : shortTerm.slice(2, 4);
  // Empty while short_term is capped at 4
  const month3 = shortTerm.slice(4, 6);
  return [month1, month2, month3];
}

export function summarizeAnalysis(result: AnalysisResult): AnalysisSummary {
  const insights = allInsights(result);
  const ranked = rankInsights(insights);

  const priorityDistribution: Record<Priority, number> = { High: 0, Medium: 0, Low: 0 };
  for (const insight of insights) {
    priorityDistribution[insight.priority]++;
  }

  const byCategory: Record<string, Insight[]> = {};
  for (const insight of ranked) {
    (byCategory[insight.category] ??= []).push(insight);
  }

  return {
    totalInsights: insights.length,
    priorityDistribution,
    highPriorityCount: priorityDistribution.High,
    averageImpact: mean(insights.map((i) => i.impactScore)),
    averageConfidence: mean(insights.map((i) => i.confidence)),
    quickWins: ranked.filter((i) => i.impactScore >= 7 && i.effort === 'Low'),
    byCategory,
    monthlyFocus: planMonthlyFocus(result.actionPlan.short_term),
  };
}
