/**
 * Alt-text check for images
 */

import type { CategoryResult } from '../types/index.js';
import type { ParsedDocument } from '../utils/document.js';
import { clampScore } from './shared.js';

export function checkAltText(document: ParsedDocument): CategoryResult {
  const images = document.findAll(['img']);
  if (images.length === 0) {
    return { score: 1, issues: [] };
  }

  let missingAlt = 0;
  let emptyAlt = 0;
  const issues: string[] = [];

  for (const img of images) {
    const src = img.getAttribute('src') ?? 'unknown';
    const alt = img.getAttribute('alt');

    if (alt === undefined) {
      missingAlt++;
      issues.push(`Image missing alt attribute: ${src}`);
    } else if (alt.trim() === '' && img.getAttribute('role') !== 'presentation') {
      emptyAlt++;
      issues.push(`Image has empty alt text: ${src}`);
    }
  }

  const score = 1 - (missingAlt + emptyAlt * 0.5) / images.length;
  return { score: clampScore(score), issues };
}
