/**
 * Rule-Based Tips
 *
 * Fixed-sentence tips derived from one page's metrics. Always available,
 * with or without a language model.
 */

import { MAX_TIPS } from '../../analysis.config.js';
import type { MetricsRecord } from '../types.js';

export function generateRuleBasedTips(record: MetricsRecord): string[] {
  const tips: string[] = [];

  // Title
  if (!record.title) {
    tips.push('Add a proper title tag with target keywords (50-60 characters)');
  } else if (record.title.length > 60) {
    tips.push('Shorten title tag to under 60 characters for better display in search results');
  }

  // Meta description
  if (!record.metaDescription) {
    tips.push('Add a compelling meta description (150-160 characters) to improve click-through rates');
  } else if (record.metaDescription.length > 160) {
    tips.push('Shorten meta description to under 160 characters for better search results display');
  }

  if (!record.mobileFriendly) {
    tips.push('Optimize website for mobile devices (Google uses mobile-first indexing)');
  }

  if (!record.hasSsl) {
    tips.push('Install SSL certificate to enable HTTPS (ranking factor and improves security)');
  }

  if (record.loadTime > 3) {
    tips.push(`Improve page load time (current: ${record.loadTime}s, target: under 3s)`);
  }

  // Content length
  if (record.wordCount < 300) {
    tips.push('Increase content length (aim for at least 300 words for better ranking potential)');
  } else if (record.wordCount > 1500) {
    tips.push('Consider breaking up long content into multiple pages or adding better content structure');
  }

  // Headings
  if (record.headings.h1 === 0) {
    tips.push('Add a single H1 tag with primary keywords');
  } else if (record.headings.h1 > 1) {
    tips.push('Reduce to only one H1 tag per page for better SEO structure');
  }

  if (record.imageCount > 0 && record.imagesMissingAlt > 0) {
    tips.push('Add alt text to all images for accessibility and SEO benefits');
  }

  if (record.internalLinks < 5) {
    tips.push('Add more internal links to important pages to improve site structure and link equity flow');
  }

  return tips.slice(0, MAX_TIPS);
}
