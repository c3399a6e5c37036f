/**
 * Insight Ranker
 *
 * Orders insights, buckets them into the action plan and derives the
 * overall score. Everything here is pure.
 */

import { HORIZON_LIMITS } from '../../analysis.config.js';
import { AnalysisError } from '../errors.js';
import { HORIZONS, type ActionPlan, type Horizon, type Insight, type Priority } from '../types.js';

// ============================================================================
// Ranking
// ============================================================================

export const PRIORITY_RANK: Record<Priority, number> = {
  High: 3,
  Medium: 2,
  Low: 1,
};

/**
 * Descending by priority, impact, confidence, then recommendation length.
 * Returns 0 only for insights that tie on every key.
 */
export function compareInsights(a: Insight, b: Insight): number {
  return (
    PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] ||
    b.impactScore - a.impactScore ||
    b.confidence - a.confidence ||
    b.recommendation.length - a.recommendation.length
  );
}

/**
 * Stable sort (Array.prototype.sort is stable); the input is not mutated.
 */
export function rankInsights(insights: readonly Insight[]): Insight[] {
  return [...insights].sort(compareInsights);
}

// ============================================================================
// Action Plan
// ============================================================================

export const HORIZON_PRIORITY: Record<Horizon, Priority> = {
  immediate: 'High',
  short_term: 'Medium',
  long_term: 'Low',
};

export function buildActionPlan(insights: readonly Insight[]): ActionPlan {
  const ranked = rankInsights(insights);
  const plan: ActionPlan = { immediate: [], short_term: [], long_term: [] };

  for (const horizon of HORIZONS) {
    plan[horizon] = ranked
      .filter((insight) => insight.priority === HORIZON_PRIORITY[horizon])
      .slice(0, HORIZON_LIMITS[horizon]);
  }

  return plan;
}

// ============================================================================
// Scoring
// ============================================================================

export function scorePenalty(insight: Insight): number {
  const priority: Priority = insight.priority;
  switch (priority) {
    case 'High':
      return 10 - insight.impactScore;
    case 'Medium':
      return (8 - insight.impactScore) * 0.7;
    case 'Low':
      return (6 - insight.impactScore) * 0.4;
    default: {
      const unknown: never = priority;
      throw AnalysisError.contractViolation('Unknown insight priority', String(unknown));
    }
  }
}

/**
 * 100 minus the summed penalties, clamped to [0, 100].
 * Low-impact insights can push the raw value past either bound.
 */
export function calculateOverallScore(insights: readonly Insight[]): number {
  const penalty = insights.reduce((sum, insight) => sum + scorePenalty(insight), 0);
  return Math.max(0, Math.min(100, 100 - penalty));
}
