/**
 * Analysis Types
 *
 * Core records flowing through the insight pipeline:
 * raw measurements -> assessments -> insights -> action plan -> report.
 */

// ============================================================================
// Closed Enumerations
// ============================================================================

export const PRIORITIES = ['High', 'Medium', 'Low'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const EFFORTS = ['Low', 'Medium', 'High'] as const;
export type Effort = (typeof EFFORTS)[number];

export const HORIZONS = ['immediate', 'short_term', 'long_term'] as const;
export type Horizon = (typeof HORIZONS)[number];

export type Severity = 'low' | 'medium' | 'high';

export type PerformanceGrade = 'A' | 'B' | 'C' | 'F';

export type ContentGrade = 'Excellent' | 'Good' | 'Fair' | 'Poor';

export const HEADING_LEVELS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'] as const;
export type HeadingLevel = (typeof HEADING_LEVELS)[number];

export type HeadingCounts = Record<HeadingLevel, number>;

// ============================================================================
// Raw Measurements
// ============================================================================

export interface MetricsRecord {
  /** URL that was analyzed */
  url: string;
  /** HTTP status (0 when the page could not be fetched) */
  statusCode: number;
  /** Seconds until the full response body arrived */
  loadTime: number;
  /** Visible word count */
  wordCount: number;
  title: string | null;
  metaDescription: string | null;
  metaKeywords: string | null;
  /** Heading counts per level */
  headings: HeadingCounts;
  imageCount: number;
  /** Images without an alt attribute */
  imagesMissingAlt: number;
  internalLinks: number;
  externalLinks: number;
  /** Viewport meta tag present */
  mobileFriendly: boolean;
  hasSsl: boolean;
  /** JSON-LD or microdata present */
  hasSchema: boolean;
  hasCanonical: boolean;
  canonicalUrl: string | null;
  hasOpenGraph: boolean;
  hasTwitterCard: boolean;
  hasGzip: boolean;
  cacheControl: string | null;
  server: string | null;
  robotsMeta: string | null;
  /** Response body size in bytes */
  contentLength: number;
  /** Set when the page could not be measured */
  error?: string;
}

export type KeywordVolume = number | 'unknown';

export interface KeywordMetric {
  keyword: string;
  /** Monthly searches, or 'unknown' when the provider has no figure */
  searchVolume: KeywordVolume;
  /** Ranking difficulty (0-100) */
  difficulty: number;
  /** Cost per click */
  cpc: number;
  relatedKeywords: string[];
  /** Where the figures came from */
  source: 'provider' | 'simulated';
}

// ============================================================================
// Assessments
// ============================================================================

export interface SpeedAssessment {
  loadTime: number;
  grade: PerformanceGrade;
  needsOptimization: boolean;
  severity: Severity;
}

export interface ContentAssessment {
  wordCount: number;
  /** 0-100 */
  qualityScore: number;
  hasMetaDescription: boolean;
  hasTitle: boolean;
  grade: ContentGrade;
}

// ============================================================================
// Insights & Planning
// ============================================================================

export interface Insight {
  /** Free-form grouping label, e.g. "Technical SEO" */
  category: string;
  priority: Priority;
  /** Detected condition */
  issue: string;
  /** Actionable fix */
  recommendation: string;
  /** Expected benefit of acting (0-10) */
  impactScore: number;
  effort: Effort;
  /** Certainty in the recommendation (0-1) */
  confidence: number;
}

export type ActionPlan = Record<Horizon, Insight[]>;

export interface InsightGroups {
  site: Insight[];
  competitive: Insight[];
  keyword: Insight[];
}

export interface AnalysisResult {
  siteInsights: Insight[];
  competitiveInsights: Insight[];
  keywordInsights: Insight[];
  actionPlan: ActionPlan;
  /** 0-100 */
  overallScore: number;
  /** Recommendations of the immediate horizon, in plan order */
  priorityRecommendations: string[];
}

export interface AnalysisSummary {
  totalInsights: number;
  priorityDistribution: Record<Priority, number>;
  highPriorityCount: number;
  /** Mean impact score, null when there are no insights */
  averageImpact: number | null;
  /** Mean confidence, null when there are no insights */
  averageConfidence: number | null;
  /** High-impact, low-effort insights in ranked order */
  quickWins: Insight[];
  byCategory: Record<string, Insight[]>;
  /** Short-term work spread over three months */
  monthlyFocus: [Insight[], Insight[], Insight[]];
}

// ============================================================================
// Keyword Research Extras
// ============================================================================

export interface KeywordSummary {
  totalKeywords: number;
  averageVolume: number;
  maxVolume: number;
  minVolume: number;
  averageDifficulty: number;
  averageCpc: number;
  /** Keywords with difficulty below 40 */
  opportunityCount: number;
  /** Keywords with difficulty above 70 */
  competitiveCount: number;
}

// ============================================================================
// Run Output
// ============================================================================

export interface CollectorError {
  collector: 'page' | 'competitor' | 'keywords' | 'suggestions';
  target: string;
  message: string;
}

export interface SuggestionDiagnostics {
  /** Whether a model was reachable for this run */
  available: boolean;
  provider: string | null;
  model: string | null;
  calls: number;
  failures: number;
  cost: number;
}

export interface AnalysisRun {
  analysis: AnalysisResult;
  summary: AnalysisSummary;
  site: MetricsRecord;
  competitors: MetricsRecord[];
  keywords: KeywordMetric[];
  keywordSummary: KeywordSummary | null;
  keywordSuggestions: string[];
  /** Merged AI and rule-based tips */
  tips: string[];
  suggestions: SuggestionDiagnostics;
  errors: CollectorError[];
  generatedAt: string;
  durationMs: number;
}
