/**
 * Qualitative rating bands for a 0-100 score
 */

import type { Rating } from '../types/index.js';

/** Inclusive lower bounds, highest first */
const RATING_BANDS: ReadonlyArray<[number, Rating]> = [
  [90, 'Excellent'],
  [80, 'Good'],
  [70, 'Fair'],
  [50, 'Poor'],
];

export function getScoreRating(score: number): Rating {
  for (const [minimum, rating] of RATING_BANDS) {
    if (score >= minimum) return rating;
  }
  return 'Very Poor';
}
