/**
 * Category table: display order, titles and default weights
 */

import type { CategoryName, CategoryResult, CategoryWeights, Report } from '../types/index.js';

/** Report order; matches the order the checkers run in */
export const CATEGORY_ORDER: readonly CategoryName[] = [
  'images',
  'headings',
  'links',
  'forms',
  'structure',
  'contrast',
  'keyboard',
];

/**
 * Default weights. They add up to 1.0 with `keyboard`, which has no checker,
 * so the evaluated categories add up to 0.90 and the total is normalized by
 * the weights actually used.
 */
export const DEFAULT_WEIGHTS: Readonly<CategoryWeights> = {
  images: 0.15,
  headings: 0.15,
  links: 0.10,
  forms: 0.15,
  contrast: 0.15,
  keyboard: 0.10,
  structure: 0.20,
};

export function categoryTitle(category: CategoryName): string {
  return category.charAt(0).toUpperCase() + category.slice(1);
}

/**
 * Evaluated categories of a report, in report order
 */
export function categoryEntries(report: Report): Array<[CategoryName, CategoryResult]> {
  const entries: Array<[CategoryName, CategoryResult]> = [];
  for (const category of CATEGORY_ORDER) {
    const result = report.categories[category];
    if (result) {
      entries.push([category, result]);
    }
  }
  return entries;
}
