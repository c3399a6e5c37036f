/**
 * Page Metrics Collector
 *
 * Fetches one page and turns it into a MetricsRecord. Never rejects: any
 * failure yields the error record for that URL.
 */

import { TIMEOUT_PAGE_FETCH } from '../../analysis.config.js';
import { getErrorMessage } from '../errors.js';
import { extractPageSignals } from '../extractors/index.js';
import { fetchPageHtml } from '../fetchers.js';
import { logger } from '../logger.js';
import { createErrorMetricsRecord, createMetricsRecord } from '../records.js';
import type { MetricsRecord } from '../types.js';
import { normalizeUrl } from '../url.js';

export interface PageFetchOptions {
  timeout?: number;
}

export async function fetchPageMetrics(
  url: string,
  options: PageFetchOptions = {}
): Promise<MetricsRecord> {
  const timeout = options.timeout ?? TIMEOUT_PAGE_FETCH;

  let target: string;
  try {
    target = normalizeUrl(url).href;
  } catch (err) {
    logger.warn('Collectors', `Skipping ${url}: ${getErrorMessage(err)}`);
    return createErrorMetricsRecord(url, getErrorMessage(err));
  }

  try {
    const page = await fetchPageHtml(target, { timeout });
    const signals = extractPageSignals(page.html, page.finalUrl);
    const headers = page.headers;

    logger.info('Collectors', `Fetched ${target} in ${page.loadTime}s`);

    return createMetricsRecord({
      url: target,
      statusCode: page.status,
      loadTime: page.loadTime,
      ...signals,
      hasSsl: page.finalUrl.startsWith('https://'),
      hasGzip: (headers.get('content-encoding') ?? '').includes('gzip'),
      cacheControl: headers.get('cache-control'),
      server: headers.get('server'),
      contentLength: page.contentLength,
    });
  } catch (err) {
    const message = getErrorMessage(err);
    logger.warn('Collectors', `Failed to fetch ${target}: ${message}`);
    return createErrorMetricsRecord(target, message);
  }
}
