/**
 * URL Normalization Utility
 *
 * Handles URL parsing, validation, and normalization for collectors.
 */

import { AnalysisError } from './errors.js';

export interface NormalizedUrl {
  /** Full normalized URL */
  href: string;
  /** Origin (protocol + host) */
  origin: string;
  /** Protocol (https: or http:) */
  protocol: string;
  /** Hostname without www */
  hostname: string;
  /** Hostname with www if present */
  host: string;
  pathname: string;
  search: string;
}

/**
 * Normalize a URL string, adding https:// when no scheme is given.
 * Throws INVALID_URL for anything that is not http(s).
 */
export function normalizeUrl(rawUrl: string): NormalizedUrl {
  let url = rawUrl.trim();
  if (!url) {
    throw AnalysisError.invalidUrl(rawUrl);
  }

  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    url = 'https://' + url;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw AnalysisError.invalidUrl(rawUrl);
  }

  const protocol = parsed.protocol.toLowerCase();
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw AnalysisError.invalidUrl(rawUrl);
  }

  const host = parsed.host.toLowerCase();
  const hostname = parsed.hostname.toLowerCase().replace(/^www\./, '');

  return {
    href: `${protocol}//${host}${parsed.pathname}${parsed.search}`,
    origin: `${protocol}//${host}`,
    protocol,
    hostname,
    host,
    pathname: parsed.pathname,
    search: parsed.search,
  };
}

/**
 * Hostname without www, or null if the URL does not parse
 */
export function extractHostname(url: string): string | null {
  try {
    return normalizeUrl(url).hostname;
  } catch {
    return null;
  }
}
