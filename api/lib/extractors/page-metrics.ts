/**
 * Page Metrics Extractor
 *
 * Pure HTML parser for the SEO signals a MetricsRecord carries.
 * Deterministic; regex-based, no DOM.
 */

import { emptyHeadings } from '../records.js';
import { HEADING_LEVELS, type HeadingCounts } from '../types.js';

export interface PageSignals {
  title: string | null;
  metaDescription: string | null;
  metaKeywords: string | null;
  headings: HeadingCounts;
  wordCount: number;
  imageCount: number;
  imagesMissingAlt: number;
  internalLinks: number;
  externalLinks: number;
  mobileFriendly: boolean;
  hasSchema: boolean;
  hasCanonical: boolean;
  canonicalUrl: string | null;
  hasOpenGraph: boolean;
  hasTwitterCard: boolean;
  robotsMeta: string | null;
}

// ============================================================================
// Main Extraction Function
// ============================================================================

export function extractPageSignals(html: string, url: string): PageSignals {
  const metas = collectTags(html, 'meta');
  const links = collectTags(html, 'link');
  const images = collectTags(html, 'img');

  const canonical = links.find((attrs) => hasToken(attrs.rel, 'canonical'));
  const { internal, external } = countLinks(html, url);

  return {
    title: extractTitle(html),
    metaDescription: metaValue(metas, 'name', 'description') ?? metaValue(metas, 'property', 'og:description'),
    metaKeywords: metaValue(metas, 'name', 'keywords'),
    headings: countHeadings(html),
    wordCount: countWords(html),
    imageCount: images.length,
    imagesMissingAlt: images.filter((attrs) => attrs.alt === undefined).length,
    internalLinks: internal,
    externalLinks: external,
    mobileFriendly: metas.some((attrs) => attrs.name?.toLowerCase() === 'viewport'),
    hasSchema:
      /<script\b[^>]*type\s*=\s*["']application\/ld\+json["']/i.test(html) || /\bitemtype\s*=/i.test(html),
    hasCanonical: canonical !== undefined,
    canonicalUrl: canonical?.href || null,
    hasOpenGraph: ['og:title', 'og:description', 'og:image'].some(
      (property) => metaValue(metas, 'property', property) !== null
    ),
    hasTwitterCard: metas.some((attrs) => attrs.name?.toLowerCase() === 'twitter:card'),
    robotsMeta: metaValue(metas, 'name', 'robots'),
  };
}

// ============================================================================
// Tag & Attribute Parsing
// ============================================================================

type Attributes = Record<string, string | undefined>;

const ATTRIBUTE_REGEX = /([^\s"'<>/=]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g;

export function parseAttributes(source: string): Attributes {
  const attrs: Attributes = {};
  for (const match of source.matchAll(ATTRIBUTE_REGEX)) {
    const name = match[1].toLowerCase();
    if (name in attrs) continue;
    attrs[name] = decodeHtmlEntities(match[2] ?? match[3] ?? match[4] ?? '');
  }
  return attrs;
}

/**
 * Attribute maps of every <tag ...> occurrence outside comments
 */
function collectTags(html: string, tag: string): Attributes[] {
  const cleaned = html.replace(/<!--[\s\S]*?-->/g, '');
  const regex = new RegExp(`<${tag}\\b([^>]*)>`, 'gi');
  return Array.from(cleaned.matchAll(regex), (match) => parseAttributes(match[1]));
}

function hasToken(value: string | undefined, token: string): boolean {
  return value !== undefined && value.toLowerCase().split(/\s+/).includes(token);
}

function metaValue(metas: Attributes[], key: 'name' | 'property', value: string): string | null {
  for (const attrs of metas) {
    if (attrs[key]?.toLowerCase() === value) {
      const content = attrs.content?.trim();
      return content ? content : null;
    }
  }
  return null;
}

// ============================================================================
// Individual Extractors
// ============================================================================

function extractTitle(html: string): string | null {
  const match = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i);
  if (!match) return null;
  const title = decodeHtmlEntities(stripTags(match[1])).replace(/\s+/g, ' ').trim();
  return title || null;
}

function countHeadings(html: string): HeadingCounts {
  const counts = emptyHeadings();
  for (const match of html.matchAll(/<h([1-6])\b[^>]*>/gi)) {
    const level = HEADING_LEVELS[Number(match[1]) - 1];
    if (level) counts[level]++;
  }
  return counts;
}

export function countWords(html: string): number {
  const text = decodeHtmlEntities(
    html
      .replace(/<!--[\s\S]*?-->/g, ' ')
      .replace(/<script\b[^>]*>[\s\S]*?<\/script>/gi, ' ')
      .replace(/<style\b[^>]*>[\s\S]*?<\/style>/gi, ' ')
      .replace(/<[^>]+>/g, ' ')
  );
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

function countLinks(html: string, pageUrl: string): { internal: number; external: number } {
  let internal = 0;
  let external = 0;

  let baseHost: string;
  try {
    baseHost = new URL(pageUrl).hostname.replace(/^www\./, '');
  } catch {
    return { internal, external };
  }

  for (const attrs of collectTags(html, 'a')) {
    const href = attrs.href?.trim();
    if (!href || /^(#|javascript:|mailto:|tel:)/i.test(href)) continue;

    let linkHost: string;
    try {
      linkHost = new URL(href, pageUrl).hostname.replace(/^www\./, '');
    } catch {
      continue;
    }

    if (linkHost === baseHost) {
      internal++;
    } else {
      external++;
    }
  }

  return { internal, external };
}

// ============================================================================
// Utility Functions
// ============================================================================

function stripTags(html: string): string {
  return html.replace(/<[^>]+>/g, '');
}

function fromCodePoint(entity: string, codePoint: number): string {
  return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
}

export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&#(\d+);/g, (entity, code: string) => fromCodePoint(entity, parseInt(code, 10)))
    .replace(/&#x([0-9a-f]+);/gi, (entity, code: string) => fromCodePoint(entity, parseInt(code, 16)))
    .replace(/&amp;/g, '&');
}
