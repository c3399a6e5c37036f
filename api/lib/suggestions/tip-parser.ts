/**
 * Tip Parser
 *
 * Turns free-form model output into discrete tip strings.
 */

import { MAX_TIPS, MIN_TIP_LENGTH, TIP_DEDUP_KEY_LENGTH } from '../../analysis.config.js';

/** Leading list markers, checked in order; only the first match is stripped */
const LIST_MARKERS = ['. ', ') ', '- ', '* ', '• '] as const;

function stripListMarker(line: string): string {
  for (const marker of LIST_MARKERS) {
    if (line.startsWith(marker)) {
      return line.slice(marker.length);
    }
  }
  return line;
}

/**
 * Split model output into tips. Lines shorter than MIN_TIP_LENGTH characters
 * after cleanup are dropped; order is kept.
 */
export function parseTips(text: string): string[] {
  const tips: string[] = [];

  for (const rawLine of text.split('\n')) {
    const line = stripListMarker(rawLine.trim());
    if (line.length >= MIN_TIP_LENGTH) {
      tips.push(line);
    }
  }

  return tips;
}

export function tipKey(tip: string): string {
  return tip.toLowerCase().slice(0, TIP_DEDUP_KEY_LENGTH);
}

/**
 * Drop tips whose key was already seen. First occurrence wins.
 */
export function dedupeTips(tips: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const tip of tips) {
    const key = tipKey(tip);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(tip);
    }
  }

  return unique;
}

/**
 * AI tips first, then rule-based tips, deduplicated and capped
 */
export function mergeTips(aiTips: string[], ruleTips: string[], max: number = MAX_TIPS): string[] {
  return dedupeTips([...aiTips, ...ruleTips]).slice(0, max);
}
