export { extractPageSignals, parseAttributes, countWords, decodeHtmlEntities, type PageSignals } from './page-metrics.js';
