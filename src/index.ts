/**
 * a11y-grade - heuristic accessibility scoring
 *
 * Library entry point; the CLI lives in cli.ts.
 */

export * from './types/index.js';
export * from './checks/index.js';
export {
  analyzeDocument,
  calculateScore,
  createFailedReport,
  resolveWeights,
  runAccessibilityCheck,
  FETCH_FAILED_ISSUE,
  type CheckOptions,
} from './utils/scanner.js';
export { getScoreRating } from './utils/rating.js';
export { CATEGORY_ORDER, DEFAULT_WEIGHTS, categoryEntries, categoryTitle } from './utils/categories.js';
export { parseHtml, type DocumentElement, type ParsedDocument } from './utils/document.js';
export {
  fetchDocument,
  fetchHtml,
  readDocumentFile,
  createDocumentLoader,
  DEFAULT_TIMEOUT,
  DEFAULT_RETRIES,
  type DocumentLoader,
  type FetchOptions,
} from './utils/fetch.js';
export { FetchError, diagnoseFetchError, type Diagnosis } from './utils/errors.js';
export {
  formatResults,
  convertToCsv,
  convertToJson,
  parseReport,
  renderReport,
} from './utils/converters.js';
export { loadConfig, validateConfig, type GradeConfig } from './utils/config.js';
