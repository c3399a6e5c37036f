import { describe, it, expect } from 'vitest';
import {
  generateKeywordSuggestions,
  generateRelatedKeywords,
  industryKeywords,
  KEYWORD_LEXICON,
  pluralVariant,
  summarizeKeywords,
  synonymVariants,
} from '../api/lib/collectors/keyword-research.js';
import { makeKeyword } from './helpers.js';

// ─── Related keywords ────────────────────────────────────────────────────────

describe('generateRelatedKeywords', () => {
  it('takes two modifiers from each family', () => {
    expect(generateRelatedKeywords('SEO Tools')).toEqual([
      'how to seo tools',
      'what is seo tools',
      'best seo tools',
      'top seo tools',
      'seo tools near me',
      'seo tools local',
      'guide seo tools',
      'tips seo tools',
    ]);
  });

  it('fills slots left by duplicate modifiers with synonyms and the plural form', () => {
    const lexicon = {
      ...KEYWORD_LEXICON,
      modifiers: { question: ['how to', 'how to'], commercial: ['best'], local: ['near me'], longTail: ['guide'] },
    };
    expect(generateRelatedKeywords('widget', lexicon)).toEqual([
      'how to widget',
      'best widget',
      'widget near me',
      'guide widget',
      'widgets',
    ]);
  });

  it('returns nothing for a blank keyword', () => {
    expect(generateRelatedKeywords('   ')).toEqual([]);
  });

  it('never returns more than eight entries', () => {
    expect(generateRelatedKeywords('digital marketing strategy').length).toBeLessThanOrEqual(8);
  });
});

describe('synonymVariants', () => {
  it('swaps every known word', () => {
    expect(synonymVariants('website strategy')).toEqual([
      'site strategy',
      'web page strategy',
      'online presence strategy',
      'website plan',
      'website approach',
      'website methodology',
    ]);
  });
});

describe('pluralVariant', () => {
  it('adds or removes a trailing s', () => {
    expect(pluralVariant('widget')).toBe('widgets');
    expect(pluralVariant('widgets')).toBe('widget');
    expect(pluralVariant('bus')).toBeNull();
  });
});

// ─── Suggestions ─────────────────────────────────────────────────────────────

describe('generateKeywordSuggestions', () => {
  it('combines pairs in both orders, then adds industry terms', () => {
    expect(generateKeywordSuggestions(['seo', 'coffee'])).toEqual([
      'seo coffee',
      'coffee seo',
      'SERP',
      'backlinks',
      'keyword ranking',
    ]);
  });

  it('draws terms from every matching industry', () => {
    expect(industryKeywords('digital marketing')).toEqual([
      'lead generation',
      'conversion rate',
      'ROI',
      'online presence',
      'social media',
      'content marketing',
    ]);
  });

  it('caps at ten unique suggestions', () => {
    const suggestions = generateKeywordSuggestions(['a', 'b', 'c', 'd']);
    expect(suggestions).toHaveLength(10);
    expect(new Set(suggestions).size).toBe(10);
    expect(suggestions.slice(0, 2)).toEqual(['a b', 'b a']);
  });

  it('returns nothing for no keywords', () => {
    expect(generateKeywordSuggestions([])).toEqual([]);
  });
});

// ─── Summary ─────────────────────────────────────────────────────────────────

describe('summarizeKeywords', () => {
  it('returns null for no keywords', () => {
    expect(summarizeKeywords([])).toBeNull();
  });

  it('averages numeric volumes only', () => {
    const summary = summarizeKeywords([
      makeKeyword('a', 1000, { difficulty: 30, cpc: 1 }),
      makeKeyword('b', 3000, { difficulty: 80, cpc: 2 }),
      makeKeyword('c', 'unknown', { difficulty: 50, cpc: 3 }),
    ]);

    expect(summary).toEqual({
      totalKeywords: 3,
      averageVolume: 2000,
      maxVolume: 3000,
      minVolume: 1000,
      averageDifficulty: 160 / 3,
      averageCpc: 2,
      opportunityCount: 1,
      competitiveCount: 1,
    });
  });
});
