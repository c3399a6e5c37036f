/**
 * SEO Insight Pipeline - Configuration Constants
 *
 * Timeouts, limits, thresholds and model defaults used across the pipeline.
 */

// ============================================================================
// TIMEOUTS
// ============================================================================

/**
 * Page fetch timeout - 10 seconds
 */
export const TIMEOUT_PAGE_FETCH = 10000;

/**
 * Keyword provider request timeout - 10 seconds (per keyword)
 */
export const TIMEOUT_KEYWORD_PROVIDER = 10000;

/**
 * Language model call timeout - 30 seconds
 */
export const TIMEOUT_LLM = 30000;

// ============================================================================
// LIMITS
// ============================================================================

/**
 * Maximum HTML characters kept for signal extraction (2MB)
 */
export const MAX_HTML_LENGTH = 2 * 1024 * 1024;

/**
 * Maximum concurrent calls per language model provider
 */
export const LLM_MAX_CONCURRENT = 2;

/**
 * Maximum tips returned after merging AI and rule-based tips
 */
export const MAX_TIPS = 12;

/**
 * Tip lines shorter than this are treated as noise
 */
export const MIN_TIP_LENGTH = 30;

/**
 * Characters of a tip used as its deduplication key
 */
export const TIP_DEDUP_KEY_LENGTH = 50;

/**
 * Action plan horizon caps
 */
export const HORIZON_LIMITS = {
  immediate: 4,
  short_term: 4,
  long_term: 3,
} as const;

/**
 * Keywords named in the high-volume recommendation
 */
export const MAX_LISTED_KEYWORDS = 3;

// ============================================================================
// RULE THRESHOLDS
// ============================================================================

/**
 * Subject load time above this multiple of the competitor mean is a gap
 */
export const COMPETITOR_LOAD_TIME_RATIO = 1.2;

/**
 * Subject word count below this multiple of the competitor mean is a gap
 */
export const COMPETITOR_CONTENT_RATIO = 0.7;

export const HIGH_VOLUME_THRESHOLD = 1000;

export const MEDIUM_VOLUME_MIN = 100;

// ============================================================================
// MODEL DEFAULTS
// ============================================================================

export const DEFAULT_MODELS = {
  openai: 'gpt-4o-mini',
  groq: 'llama-3.1-8b-instant',
  gemini: 'gemini-2.0-flash',
} as const;

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export const KEYWORD_PROVIDER_URL = 'https://api.exa.ai/search';

// ============================================================================
// VERSION
// ============================================================================

export const PIPELINE_VERSION = '0.1.0';
