/**
 * Suggestion Profile Store
 *
 * Loads and saves the suggestion profile in Upstash Redis. Without Redis
 * credentials, or when the stored value does not validate, the built-in
 * profile is used.
 */

import { Redis } from '@upstash/redis';
import { getErrorMessage } from './lib/errors.js';
import { logger } from './lib/logger.js';
import type { AnalysisSettings } from './lib/settings.js';
import {
  DEFAULT_SUGGESTION_PROFILE,
  SuggestionProfileSchema,
  type SuggestionProfile,
} from './lib/suggestions/profile.js';

export const PROFILE_KEY = 'seo-insight:suggestion-profile';

function getRedis(settings: AnalysisSettings): Redis | null {
  if (!settings.redis) {
    return null;
  }
  return new Redis({ url: settings.redis.url, token: settings.redis.token });
}

export async function loadSuggestionProfile(settings: AnalysisSettings): Promise<SuggestionProfile> {
  const redis = getRedis(settings);
  if (!redis) {
    logger.debug('Config', 'Redis not configured, using default suggestion profile');
    return DEFAULT_SUGGESTION_PROFILE;
  }

  try {
    const stored = await redis.get<unknown>(PROFILE_KEY);
    if (stored === null || stored === undefined) {
      return DEFAULT_SUGGESTION_PROFILE;
    }

    const parsed = SuggestionProfileSchema.safeParse(stored);
    if (!parsed.success) {
      logger.warn('Config', 'Stored suggestion profile is invalid, using defaults', parsed.error.message);
      return DEFAULT_SUGGESTION_PROFILE;
    }
    return parsed.data;
  } catch (error) {
    logger.error('Config', `Failed to load suggestion profile from Redis: ${getErrorMessage(error)}`);
    return DEFAULT_SUGGESTION_PROFILE;
  }
}

/**
 * Returns false when Redis is not configured or the write fails
 */
export async function saveSuggestionProfile(
  settings: AnalysisSettings,
  profile: SuggestionProfile
): Promise<boolean> {
  const redis = getRedis(settings);
  if (!redis) {
    logger.warn('Config', 'Redis not configured, cannot save');
    return false;
  }

  try {
    await redis.set(PROFILE_KEY, profile);
    return true;
  } catch (error) {
    logger.error('Config', `Failed to save suggestion profile to Redis: ${getErrorMessage(error)}`);
    return false;
  }
}
