/**
 * Aggregator: runs every checker against one document and folds the results
 * into a weighted report
 */

import type {
  CategoryName,
  CategoryResult,
  CategoryWeights,
  CheckFailure,
  Report,
} from '../types/index.js';
import { CHECKERS, type Checker } from '../checks/index.js';
import { CATEGORY_ORDER, DEFAULT_WEIGHTS } from './categories.js';
import { diagnoseFetchError } from './errors.js';
import { createDocumentLoader, type DocumentLoader, type FetchOptions } from './fetch.js';
import type { ParsedDocument } from './document.js';

export const FETCH_FAILED_ISSUE = 'Failed to fetch URL';

export interface CheckOptions {
  /** Overrides merged over DEFAULT_WEIGHTS */
  weights?: Partial<CategoryWeights>;
  fetch?: FetchOptions;
  /** Replaces the default URL/file loader */
  loadDocument?: DocumentLoader;
  /** Checker table to run, defaults to CHECKERS */
  checkers?: readonly Checker[];
}

export function resolveWeights(overrides: Partial<CategoryWeights> = {}): CategoryWeights {
  const weights: CategoryWeights = { ...DEFAULT_WEIGHTS };
  for (const category of CATEGORY_ORDER) {
    weights[category] = overrides[category] ?? DEFAULT_WEIGHTS[category];
  }
  return weights;
}

/**
 * Weighted mean of the evaluated categories as an integer 0-100.
 * Divides by the weight of the categories present, not by 1.0.
 */
export function calculateScore(
  categories: Partial<Record<CategoryName, CategoryResult>>,
  weights: CategoryWeights = DEFAULT_WEIGHTS
): number {
  let weightedSum = 0;
  let weightTotal = 0;

  for (const category of CATEGORY_ORDER) {
    const result = categories[category];
    if (!result) continue;
    weightedSum += result.score * weights[category];
    weightTotal += weights[category];
  }

  if (weightTotal <= 0) return 0;
  return Math.round((weightedSum / weightTotal) * 100);
}

/**
 * Run the checkers on an already parsed document
 */
export function analyzeDocument(
  document: ParsedDocument,
  url: string,
  weights: CategoryWeights = DEFAULT_WEIGHTS,
  checkers: readonly Checker[] = CHECKERS
): Report {
  const categories: Partial<Record<CategoryName, CategoryResult>> = {};
  const issues: string[] = [];
  const failedChecks: CheckFailure[] = [];

  for (const checker of checkers) {
    let result: CategoryResult;
    try {
      result = checker.check(document);
    } catch (error) {
      // A broken checker drops its own category only
      failedChecks.push({
        category: checker.category,
        message: error instanceof Error ? error.message : String(error),
      });
      continue;
    }

    categories[checker.category] = { score: result.score, issues: [...result.issues] };
    issues.push(...result.issues);
  }

  return {
    url,
    categories,
    totalScore: calculateScore(categories, weights),
    issues,
    ...(failedChecks.length > 0 ? { failedChecks } : {}),
  };
}

/**
 * Zero-score report for a page that could not be loaded
 */
export function createFailedReport(url: string, error: unknown): Report {
  return {
    url,
    categories: {},
    totalScore: 0,
    issues: [FETCH_FAILED_ISSUE],
    error: diagnoseFetchError(error).message,
  };
}

/**
 * Load a URL (or local HTML file) and score it
 */
export async function runAccessibilityCheck(url: string, options: CheckOptions = {}): Promise<Report> {
  const load = options.loadDocument ?? createDocumentLoader(options.fetch);

  let document: ParsedDocument;
  try {
    document = await load(url);
  } catch (error) {
    return createFailedReport(url, error);
  }

  return analyzeDocument(document, url, resolveWeights(options.weights), options.checkers);
}
