/**
 * Semantic landmark check
 */

import type { CategoryResult } from '../types/index.js';
import type { ParsedDocument } from '../utils/document.js';

export const LANDMARK_TAGS = ['header', 'footer', 'nav', 'main', 'article', 'section', 'aside'] as const;

/** Landmark count that earns full credit */
const EXPECTED_LANDMARKS = 3;
const NO_MAIN_PENALTY = 0.3;

export function checkSemanticStructure(document: ParsedDocument): CategoryResult {
  const landmarks = document.findAll(LANDMARK_TAGS);
  const issues: string[] = [];

  let score = Math.min(1, landmarks.length / EXPECTED_LANDMARKS);

  if (landmarks.length === 0) {
    issues.push('No semantic HTML elements found');
  }

  if (!landmarks.some(el => el.tagName === 'main')) {
    issues.push('No <main> element found');
    score -= NO_MAIN_PENALTY;
  }

  return { score: Math.max(0, score), issues };
}
