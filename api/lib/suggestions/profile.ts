/**
 * Suggestion Profile
 *
 * Per-step prompt configuration for the language model calls. The built-in
 * profile is used unless a stored one validates.
 */

import { z } from 'zod';

export const SUGGESTION_STEP_IDS = ['site', 'competitive', 'keyword', 'tips'] as const;
export type SuggestionStepId = (typeof SUGGESTION_STEP_IDS)[number];

export interface SuggestionStepConfig {
  id: SuggestionStepId;
  title: string;
  /** Empty or absent means the provider's default model */
  model?: string;
  systemInstruction: string;
  /** Template with {{variable}} placeholders */
  promptTemplate: string;
  temperature?: number;
  maxTokens?: number;
}

export interface SuggestionProfile {
  steps: Record<SuggestionStepId, SuggestionStepConfig>;
}

const StepSchema = z.object({
  id: z.enum(SUGGESTION_STEP_IDS),
  title: z.string().min(1),
  model: z.string().optional(),
  systemInstruction: z.string().min(1),
  promptTemplate: z.string().min(1),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});

export const SuggestionProfileSchema = z.object({
  steps: z.object({
    site: StepSchema,
    competitive: StepSchema,
    keyword: StepSchema,
    tips: StepSchema,
  }),
});

const CONSULTANT = 'You are an expert SEO consultant with 10+ years of experience.';

export const DEFAULT_SUGGESTION_PROFILE: SuggestionProfile = {
  steps: {
    site: {
      id: 'site',
      title: 'Site Analysis',
      systemInstruction: `${CONSULTANT} Answer with one recommendation per line.`,
      promptTemplate: `Analyze this website data and provide specific SEO insights:

Site URL: {{url}}
Page Load Time: {{loadTime}} seconds
Performance Grade: {{performanceGrade}}
Content Quality Score: {{qualityScore}}/100
Word Count: {{wordCount}}
Has Meta Description: {{hasMetaDescription}}
Has Title Tag: {{hasTitle}}
Mobile Friendly: {{mobileFriendly}}

Provide 3-5 specific, actionable SEO recommendations, each on its own line, starting with an action verb.`,
      temperature: 0.3,
      maxTokens: 1024,
    },
    competitive: {
      id: 'competitive',
      title: 'Competitive Analysis',
      systemInstruction: `${CONSULTANT} Answer with one recommendation per line.`,
      promptTemplate: `Perform competitive SEO analysis:

YOUR SITE:
- Load Time: {{loadTime}}s
- Word Count: {{wordCount}}
- Mobile Friendly: {{mobileFriendly}}

COMPETITORS:
{{competitors}}

Identify competitive gaps and opportunities with specific recommendations, one per line.`,
      temperature: 0.3,
      maxTokens: 1024,
    },
    keyword: {
      id: 'keyword',
      title: 'Keyword Opportunities',
      systemInstruction: `${CONSULTANT} Answer with one recommendation per line.`,
      promptTemplate: `Analyze keyword opportunities for SEO strategy:

Target Keywords and Search Volumes:
{{keywords}}

Current Site Content: {{wordCount}} words
Current Title: {{title}}
Current Meta: {{metaDescription}}

Provide keyword optimization recommendations, one per line.`,
      temperature: 0.3,
      maxTokens: 1024,
    },
    tips: {
      id: 'tips',
      title: 'SEO Tips',
      systemInstruction: `${CONSULTANT}
Analyze the provided website data and give specific, actionable SEO recommendations.
Focus on high-impact improvements that can be implemented quickly.
Provide exactly 8-12 specific recommendations.`,
      promptTemplate: `Analyze this website's SEO performance and provide specific recommendations:

WEBSITE DATA:
- URL: {{url}}
- Title: {{title}}
- Meta Description: {{metaDescription}}
- Page Load Time: {{loadTime}} seconds
- Word Count: {{wordCount}} words
- Mobile Friendly: {{mobileFriendly}}
- HTTPS: {{hasSsl}}
- Image Count: {{imageCount}}
- Internal Links: {{internalLinks}}
- External Links: {{externalLinks}}

TECHNICAL DATA:
- Has Canonical URL: {{hasCanonical}}
- Has Open Graph: {{hasOpenGraph}}
- Has Schema Markup: {{hasSchema}}
- Gzip Enabled: {{hasGzip}}

HEADING STRUCTURE:
{{headings}}

REQUIREMENTS:
1. Identify the top 3 critical issues affecting SEO performance
2. Provide specific, actionable recommendations for each issue
3. Include technical SEO improvements where applicable
4. Suggest content optimization strategies
5. Recommend on-page SEO enhancements
6. Address mobile and performance concerns

Format each recommendation as a clear, actionable tip starting with an action verb, one per line.`,
      temperature: 0.3,
      maxTokens: 1024,
    },
  },
};
