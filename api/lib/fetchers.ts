/**
 * Page Fetchers
 *
 * Timeout-enabled HTTP retrieval. No retries: a failed fetch is reported
 * once and the caller degrades.
 */

import { MAX_HTML_LENGTH, TIMEOUT_PAGE_FETCH } from '../analysis.config.js';
import { AnalysisError } from './errors.js';

export const USER_AGENT =
  'Mozilla/5.0 (compatible; SeoInsightPipeline/0.1; +https://www.npmjs.com/package/seo-insight-pipeline)';

export interface FetchOptions {
  timeout?: number;
  headers?: Record<string, string>;
  method?: string;
  body?: string;
}

export interface PageFetchResult {
  /** URL after redirects */
  finalUrl: string;
  status: number;
  headers: Headers;
  /** Body, truncated to MAX_HTML_LENGTH characters */
  html: string;
  /** Full body size in bytes */
  contentLength: number;
  /** Seconds from request start until the body was read */
  loadTime: number;
}

/**
 * fetch() bounded by an AbortController timer.
 * Rejects with an AnalysisError (TIMEOUT, NETWORK_ERROR or FETCH_FAILED).
 */
export async function fetchWithTimeout(
  url: string,
  options: FetchOptions = {}
): Promise<Response> {
  const { timeout = TIMEOUT_PAGE_FETCH, headers, method = 'GET', body } = options;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetch(url, {
      method,
      body,
      headers: { 'User-Agent': USER_AGENT, ...headers },
      redirect: 'follow',
      signal: controller.signal,
    });
  } catch (err) {
    throw AnalysisError.fromFetchError(err, url);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch a page and read its body within a single timeout.
 * Non-2xx responses reject with HTTP_ERROR.
 */
export async function fetchPageHtml(
  url: string,
  options: { timeout?: number } = {}
): Promise<PageFetchResult> {
  const timeout = options.timeout ?? TIMEOUT_PAGE_FETCH;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);
  const startTime = Date.now();

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Encoding': 'gzip, deflate, br',
      },
      redirect: 'follow',
      signal: controller.signal,
    });

    if (!response.ok) {
      throw AnalysisError.httpStatus(url, response.status);
    }

    const body = await response.text();
    const loadTime = Math.round((Date.now() - startTime) / 10) / 100;

    return {
      finalUrl: response.url || url,
      status: response.status,
      headers: response.headers,
      html: body.length > MAX_HTML_LENGTH ? body.slice(0, MAX_HTML_LENGTH) : body,
      contentLength: Buffer.byteLength(body, 'utf8'),
      loadTime,
    };
  } catch (err) {
    throw AnalysisError.fromFetchError(err, url);
  } finally {
    clearTimeout(timeoutId);
  }
}
