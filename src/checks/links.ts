/**
 * Descriptive link text check
 */

import type { CategoryResult } from '../types/index.js';
import type { ParsedDocument } from '../utils/document.js';
import { clampScore } from './shared.js';

export const POOR_LINK_TEXTS: ReadonlySet<string> = new Set([
  'click here',
  'read more',
  'more',
  'link',
  'here',
  'this',
  'page',
]);

const MIN_LINK_TEXT_LENGTH = 3;

export function checkDescriptiveLinks(document: ParsedDocument): CategoryResult {
  const links = document.findAll(['a']);
  if (links.length === 0) {
    return { score: 1, issues: [] };
  }

  let poorLinks = 0;
  const issues: string[] = [];

  for (const link of links) {
    const text = link.textContent().trim().toLowerCase();
    const href = link.getAttribute('href') ?? 'unknown';

    // Image links are named by the image's alt text
    if (!text && link.findAll(['img']).length > 0) {
      continue;
    }

    if (!text) {
      poorLinks++;
      issues.push(`Empty link text: ${href}`);
    } else if (POOR_LINK_TEXTS.has(text) || [...text].length < MIN_LINK_TEXT_LENGTH) {
      poorLinks++;
      issues.push(`Non-descriptive link text: '${text}' for ${href}`);
    }
  }

  return { score: clampScore(1 - poorLinks / links.length), issues };
}
