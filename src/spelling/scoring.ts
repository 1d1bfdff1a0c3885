/** Exponent balancing the frequency and distance terms of a score. */
export const SCORE_EXPONENT = 0.5;

/**
 * Ranks a candidate: `(frequency × 1/(distance + 1)) ^ 0.5`. Frequent words
 * and close words score higher; the square root does not change the ordering.
 */
export function scoreCandidate(frequency: number, distance: number): number {
  const distanceTerm = 1 / (distance + 1);
  return (frequency * distanceTerm) ** SCORE_EXPONENT;
}

/**
 * Picks the highest scoring candidate. Equal scores go to the
 * lexicographically smallest word so the result does not depend on how the
 * candidates were discovered. Returns `null` when the list is empty.
 */
export function selectBestCandidate(candidates: readonly string[], scores: readonly number[]): string | null {
  let best: string | null = null;
  let bestScore = Number.NEGATIVE_INFINITY;

  for (let index = 0; index < candidates.length; index += 1) {
    const candidate = candidates[index];
    const score = scores[index] ?? Number.NEGATIVE_INFINITY;
    if (score > bestScore || (score === bestScore && best !== null && candidate < best)) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}
