/**
 * Keep a sub-score inside [0, 1]
 */
export function clampScore(score: number): number {
  return Math.max(0, Math.min(score, 1));
}
