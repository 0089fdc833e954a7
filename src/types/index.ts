/**
 * Core types for the a11y-grade heuristic checker
 */

export type CategoryName =
  | 'images'
  | 'headings'
  | 'links'
  | 'forms'
  | 'contrast'
  | 'keyboard'
  | 'structure';

/** Categories that have a checker behind them */
export type EvaluatedCategory = Exclude<CategoryName, 'keyboard'>;

export type Rating = 'Excellent' | 'Good' | 'Fair' | 'Poor' | 'Very Poor';

export interface CategoryResult {
  readonly score: number;
  readonly issues: readonly string[];
}

export type CategoryWeights = Record<CategoryName, number>;

export interface CheckFailure {
  category: EvaluatedCategory;
  message: string;
}

export interface Report {
  readonly url: string;
  readonly categories: Readonly<Partial<Record<CategoryName, CategoryResult>>>;
  /** Weighted total, integer 0-100 */
  readonly totalScore: number;
  readonly issues: readonly string[];
  /** Diagnosed fetch failure, only set when the page could not be loaded */
  readonly error?: string;
  readonly failedChecks?: readonly CheckFailure[];
}

export type OutputFormat = 'markdown' | 'json' | 'csv';
