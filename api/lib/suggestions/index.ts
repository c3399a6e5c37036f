/**
 * AI Suggestions
 *
 * Issues the configured prompts concurrently and parses every answer into
 * tips. Failed calls count as failures and contribute nothing.
 */

import type { KeywordMetric, MetricsRecord, SuggestionDiagnostics } from '../types.js';
import { DEFAULT_SUGGESTION_PROFILE, type SuggestionProfile, type SuggestionStepId } from './profile.js';
import { buildPromptVariables, interpolatePrompt } from './prompts.js';
import type { SuggestionSource } from './source.js';
import { dedupeTips, parseTips } from './tip-parser.js';

export * from './profile.js';
export * from './prompts.js';
export * from './source.js';
export * from './tip-parser.js';
export { generateRuleBasedTips } from './rule-tips.js';

export interface SuggestionContext {
  site: MetricsRecord;
  competitors: MetricsRecord[];
  keywords: KeywordMetric[];
}

export interface CollectSuggestionsOptions {
  profile?: SuggestionProfile;
  /** Per-call timeout in ms */
  timeout?: number;
}

export interface SuggestionOutcome {
  /** Parsed, deduplicated AI tips in step order */
  tips: string[];
  diagnostics: SuggestionDiagnostics;
}

/**
 * Steps that apply to this context, in prompt order
 */
export function selectSteps(context: SuggestionContext): SuggestionStepId[] {
  const steps: SuggestionStepId[] = ['site'];
  if (context.competitors.length > 0) steps.push('competitive');
  if (context.keywords.length > 0) steps.push('keyword');
  steps.push('tips');
  return steps;
}

export async function collectSuggestions(
  source: SuggestionSource,
  context: SuggestionContext,
  options: CollectSuggestionsOptions = {}
): Promise<SuggestionOutcome> {
  const diagnostics: SuggestionDiagnostics = {
    available: source.available,
    provider: source.provider,
    model: source.model,
    calls: 0,
    failures: 0,
    cost: 0,
  };

  if (!source.available) {
    return { tips: [], diagnostics };
  }

  const profile = options.profile ?? DEFAULT_SUGGESTION_PROFILE;
  const variables = buildPromptVariables(context);
  const steps = selectSteps(context);

  const responses = await Promise.all(
    steps.map((id) => {
      const step = profile.steps[id];
      return source.suggest({
        label: step.title,
        prompt: interpolatePrompt(step.promptTemplate, variables),
        systemInstruction: step.systemInstruction,
        model: step.model,
        temperature: step.temperature,
        maxTokens: step.maxTokens,
        timeout: options.timeout,
      });
    })
  );

  const tips: string[] = [];
  for (const response of responses) {
    diagnostics.calls++;
    if (!response) {
      diagnostics.failures++;
      continue;
    }
    diagnostics.cost += response.cost;
    tips.push(...parseTips(response.text));
  }

  return { tips: dedupeTips(tips), diagnostics };
}
