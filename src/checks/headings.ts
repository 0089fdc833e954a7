/**
 * Heading hierarchy check: one h1 and no skipped levels
 */

import type { CategoryResult } from '../types/index.js';
import type { ParsedDocument } from '../utils/document.js';

const HEADING_TAGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'] as const;

/** Penalty per skipped level, capped at MAX_SKIP_PENALTY */
const SKIP_PENALTY = 0.1;
const MAX_SKIP_PENALTY = 0.5;
const NO_H1_PENALTY = 0.5;
const MULTIPLE_H1_PENALTY = 0.3;

export function checkHeadingStructure(document: ParsedDocument): CategoryResult {
  const headings = document.findAll(HEADING_TAGS);
  if (headings.length === 0) {
    return { score: 0, issues: ['No headings found on page'] };
  }

  const issues: string[] = [];
  const levels = headings.map(h => Number(h.tagName.slice(1)));
  const h1Count = levels.filter(level => level === 1).length;

  let score = 1;
  if (h1Count === 0) {
    issues.push('No H1 heading found');
    score -= NO_H1_PENALTY;
  } else if (h1Count > 1) {
    issues.push(`Multiple H1 headings found (${h1Count})`);
    score -= MULTIPLE_H1_PENALTY;
  }

  let previous = 0;
  let skips = 0;
  for (const level of levels) {
    if (previous > 0 && level > previous + 1) {
      skips++;
      issues.push(`Heading level skip from h${previous} to h${level}`);
    }
    previous = level;
  }

  score -= Math.min(MAX_SKIP_PENALTY, skips * SKIP_PENALTY);
  return { score: Math.max(0, score), issues };
}
