/**
 * Synthesis
 *
 * Merges the generator groups into one ranked, planned and scored result.
 */

import type { AnalysisResult, InsightGroups } from '../types.js';
import { buildActionPlan, calculateOverallScore } from './ranker.js';

export * from './ranker.js';
export { summarizeAnalysis, planMonthlyFocus, allInsights } from './summary.js';

export function aggregateInsights(groups: InsightGroups): AnalysisResult {
  const combined = [...groups.site, ...groups.competitive, ...groups.keyword];
  const actionPlan = buildActionPlan(combined);

  return {
    siteInsights: [...groups.site],
    competitiveInsights: [...groups.competitive],
    keywordInsights: [...groups.keyword],
    actionPlan,
    overallScore: calculateOverallScore(combined),
    priorityRecommendations: actionPlan.immediate.map((insight) => insight.recommendation),
  };
}
