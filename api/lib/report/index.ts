/**
 * Report Export
 *
 * Single entry point for turning an AnalysisRun into a downloadable document.
 */

import { AnalysisError } from '../errors.js';
import { logger } from '../logger.js';
import type { AnalysisRun } from '../types.js';
import { renderHtmlReport } from './html.js';
import { renderMarkdownReport } from './markdown.js';
import { reportFilename, resolveReportOptions, type ReportConfig, type ReportFormat } from './model.js';

export * from './model.js';
export { renderHtmlReport } from './html.js';
export { renderMarkdownReport } from './markdown.js';

export interface ExportedReport {
  format: ReportFormat;
  contentType: string;
  filename: string;
  body: string;
}

const CONTENT_TYPES: Record<ReportFormat, string> = {
  html: 'text/html; charset=utf-8',
  markdown: 'text/markdown; charset=utf-8',
  json: 'application/json',
};

export function exportReport(run: AnalysisRun, config: ReportConfig): ExportedReport {
  const options = resolveReportOptions(config);

  let body: string;
  switch (config.format) {
    case 'html':
      body = renderHtmlReport(run, options);
      break;
    case 'markdown':
      body = renderMarkdownReport(run, options);
      break;
    case 'json':
      body = JSON.stringify(run, null, 2);
      break;
    default: {
      const unknownFormat: never = config.format;
      throw AnalysisError.configError(`Unsupported report format: ${String(unknownFormat)}`);
    }
  }

  const filename = reportFilename(run, config.format);
  logger.debug('Report', `Rendered ${config.format} report`, { filename, bytes: body.length });

  return {
    format: config.format,
    contentType: CONTENT_TYPES[config.format],
    filename,
    body,
  };
}
