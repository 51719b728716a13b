/** Cosine similarity at or below which a chunk lends no confidence. */
const COSINE_FLOOR = 0.2;

/**
 * Rescales a cosine similarity from [COSINE_FLOOR, 1] onto [0, 1], e.g. 0.6 -> 0.5.
 */
export function normalizeScore(cosine: number): number {
  if (!Number.isFinite(cosine)) return 0;
  return Math.max(0, Math.min(1, (cosine - COSINE_FLOOR) / (1 - COSINE_FLOOR)));
}

export function meanNormalizedScore(scores: number[]): number | null {
  if (scores.length === 0) return null;
  return scores.reduce((sum, score) => sum + normalizeScore(score), 0) / scores.length;
}
