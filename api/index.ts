/**
 * SEO Insight Pipeline
 *
 * Public entry point for library use.
 */

export { runAnalysis, type AnalysisRequest, type AnalysisDependencies } from './analyze.js';
export { loadSuggestionProfile, saveSuggestionProfile, PROFILE_KEY } from './config.js';
export * from './analysis.config.js';
export * from './lib/types.js';
export { AnalysisError, isAnalysisError, getErrorMessage, type AnalysisErrorCode } from './lib/errors.js';
export { logger, setLogLevel, type LogLevel } from './lib/logger.js';
export { loadSettings, withoutLanguageModels, type AnalysisSettings } from './lib/settings.js';
export { createMetricsRecord, createErrorMetricsRecord, createKeywordMetric, createInsight } from './lib/records.js';
export * from './lib/assessors/index.js';
export * from './lib/insights/index.js';
export * from './lib/synthesis/index.js';
export * from './lib/collectors/index.js';
export * from './lib/suggestions/index.js';
export { ProviderRegistry, createProvider, type ProviderRegistryConfig } from './lib/providers/index.js';
export { exportReport, type ExportedReport, type ReportConfig, type ReportFormat, type ReportSections } from './lib/report/index.js';
export { normalizeUrl, extractHostname } from './lib/url.js';
