/**
 * Checker table, run in this order by the aggregator
 */

import type { CategoryResult, EvaluatedCategory } from '../types/index.js';
import type { ParsedDocument } from '../utils/document.js';
import { checkAltText } from './images.js';
import { checkHeadingStructure } from './headings.js';
import { checkDescriptiveLinks } from './links.js';
import { checkFormLabels } from './forms.js';
import { checkSemanticStructure } from './structure.js';
import { checkColorContrast } from './contrast.js';

export interface Checker {
  readonly category: EvaluatedCategory;
  readonly title: string;
  readonly check: (document: ParsedDocument) => CategoryResult;
}

export const CHECKERS: readonly Checker[] = [
  { category: 'images', title: 'Images', check: checkAltText },
  { category: 'headings', title: 'Headings', check: checkHeadingStructure },
  { category: 'links', title: 'Links', check: checkDescriptiveLinks },
  { category: 'forms', title: 'Forms', check: checkFormLabels },
  { category: 'structure', title: 'Structure', check: checkSemanticStructure },
  { category: 'contrast', title: 'Contrast', check: checkColorContrast },
];

export { checkAltText } from './images.js';
export { checkHeadingStructure } from './headings.js';
export { checkDescriptiveLinks, POOR_LINK_TEXTS } from './links.js';
export { checkFormLabels } from './forms.js';
export { checkSemanticStructure, LANDMARK_TAGS } from './structure.js';
export { checkColorContrast, classifyColor, LIMITED_CHECK_NOTICE } from './contrast.js';
