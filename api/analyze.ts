/**
 * Analysis Orchestrator
 *
 * collect (parallel) -> insight generators -> aggregate & rank -> AI
 * suggestions -> tips. I/O failures degrade into error records and an entry
 * in `errors`; the run itself always completes.
 */

import { TIMEOUT_LLM, TIMEOUT_PAGE_FETCH } from './analysis.config.js';
import { loadSuggestionProfile } from './config.js';
import {
  collectAll,
  defaultCollectors,
  generateKeywordSuggestions,
  normalizeKeywords,
  summarizeKeywords,
  type Collectors,
} from './lib/collectors/index.js';
import { runInsightGenerators } from './lib/insights/index.js';
import { logger } from './lib/logger.js';
import type { AnalysisSettings } from './lib/settings.js';
import {
  collectSuggestions,
  createSuggestionSource,
  DEFAULT_SUGGESTION_PROFILE,
  generateRuleBasedTips,
  mergeTips,
  UnavailableSuggestionSource,
  type SuggestionProfile,
  type SuggestionSource,
} from './lib/suggestions/index.js';
import { aggregateInsights, summarizeAnalysis } from './lib/synthesis/index.js';
import type { AnalysisRun, CollectorError } from './lib/types.js';

export interface AnalysisRequest {
  /** Subject page */
  url: string;
  competitors?: string[];
  keywords?: string[];
  /** Compare against competitors (default true) */
  includeCompetitive?: boolean;
  /** Research keywords (default true) */
  includeKeywords?: boolean;
  /** Ask a language model for extra tips when one is configured (default true) */
  useAi?: boolean;
  /** Per-request page and keyword timeout in ms */
  timeout?: number;
  /** Per-call language model timeout in ms */
  llmTimeout?: number;
}

export interface AnalysisDependencies {
  collectors?: Collectors;
  suggestionSource?: SuggestionSource;
  profile?: SuggestionProfile;
  now?: () => Date;
}

async function resolveProfile(
  source: SuggestionSource,
  settings: AnalysisSettings,
  deps: AnalysisDependencies
): Promise<SuggestionProfile> {
  if (deps.profile) return deps.profile;
  if (!source.available) return DEFAULT_SUGGESTION_PROFILE;
  return loadSuggestionProfile(settings);
}

export async function runAnalysis(
  request: AnalysisRequest,
  settings: AnalysisSettings,
  deps: AnalysisDependencies = {}
): Promise<AnalysisRun> {
  const startTime = Date.now();
  const now = deps.now ?? (() => new Date());

  const competitorUrls = request.includeCompetitive === false ? [] : request.competitors ?? [];
  const keywordList = request.includeKeywords === false ? [] : normalizeKeywords(request.keywords ?? []);

  logger.info('Analyze', `Analyzing ${request.url}`, {
    competitors: competitorUrls.length,
    keywords: keywordList.length,
  });

  const collected = await collectAll(
    {
      url: request.url,
      competitors: competitorUrls,
      keywords: keywordList,
      keywordApiKey: settings.keywordApiKey,
      timeout: request.timeout ?? TIMEOUT_PAGE_FETCH,
    },
    deps.collectors ?? defaultCollectors
  );
  const errors: CollectorError[] = [...collected.errors];

  // Unreachable competitors would drag the averages toward zero
  const measuredCompetitors = collected.competitors.filter((c) => !c.error);

  const groups = runInsightGenerators({
    site: collected.site,
    competitors: measuredCompetitors,
    keywords: collected.keywords,
  });
  const analysis = aggregateInsights(groups);

  const source =
    deps.suggestionSource ??
    (request.useAi === false ? new UnavailableSuggestionSource() : createSuggestionSource(settings));
  const profile = await resolveProfile(source, settings, deps);

  const suggestions = await collectSuggestions(
    source,
    { site: collected.site, competitors: measuredCompetitors, keywords: collected.keywords },
    { profile, timeout: request.llmTimeout ?? TIMEOUT_LLM }
  );

  if (suggestions.diagnostics.failures > 0) {
    errors.push({
      collector: 'suggestions',
      target: suggestions.diagnostics.provider ?? 'unknown',
      message: `${suggestions.diagnostics.failures} of ${suggestions.diagnostics.calls} model calls failed`,
    });
  }

  const tips = mergeTips(suggestions.tips, generateRuleBasedTips(collected.site));
  const durationMs = Date.now() - startTime;

  logger.info('Analyze', `Finished ${request.url} in ${durationMs}ms`, {
    score: analysis.overallScore,
    insights: groups.site.length + groups.competitive.length + groups.keyword.length,
    errors: errors.length,
  });

  return {
    analysis,
    summary: summarizeAnalysis(analysis),
    site: collected.site,
    competitors: collected.competitors,
    keywords: collected.keywords,
    keywordSummary: summarizeKeywords(collected.keywords),
    keywordSuggestions: generateKeywordSuggestions(keywordList),
    tips,
    suggestions: suggestions.diagnostics,
    errors,
    generatedAt: now().toISOString(),
    durationMs,
  };
}
