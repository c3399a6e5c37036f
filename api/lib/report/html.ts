/**
 * HTML Report Renderer
 *
 * Static markup from the ReportDocument component; no client-side script.
 */

import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { ReportDocument } from '../../../components/ReportDocument.js';
import type { AnalysisRun } from '../types.js';
import type { ReportOptions } from './model.js';

export function renderHtmlReport(run: AnalysisRun, options: ReportOptions): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(createElement(ReportDocument, { run, options }))}`;
}
