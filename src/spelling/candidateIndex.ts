import type { EditCosts } from "../editDistance/costs.js";
import { distanceWithCosts } from "../editDistance/distance.js";
import type { Vocabulary } from "../vocabulary/vocabulary.js";

export const SEARCH_STRATEGIES = ["linear", "length-bucket"] as const;
export type SearchStrategy = (typeof SEARCH_STRATEGIES)[number];

/**
 * Finds the vocabulary words within `maxEdits` of a token. Implementations
 * return each word once, in the vocabulary's first-appearance order, so the
 * strategy never changes which candidate a corrector ends up picking.
 */
export interface CandidateIndex {
  candidates(token: string, maxEdits: number, costs: EditCosts): string[];
}

/** Measures every distinct vocabulary word. */
export class LinearScanIndex implements CandidateIndex {
  constructor(private readonly vocabulary: Vocabulary) {}

  candidates(token: string, maxEdits: number, costs: EditCosts): string[] {
    return this.vocabulary.distinctWords.filter((word) => distanceWithCosts(token, word, costs) <= maxEdits);
  }
}

/**
 * Groups words by length and only measures the buckets that can still fall
 * within `maxEdits`. Every unit of length difference has to be paid by an
 * insert or a delete, so a word whose length differs from the token's by more
 * than `maxEdits / min(insertCost, deleteCost)` cannot qualify. With a zero
 * insert or delete cost no bucket can be ruled out and every word is scanned.
 */
export class LengthBucketIndex implements CandidateIndex {
  private readonly buckets = new Map<number, Array<{ word: string; order: number }>>();
  private readonly linear: LinearScanIndex;

  constructor(vocabulary: Vocabulary) {
    this.linear = new LinearScanIndex(vocabulary);
    vocabulary.distinctWords.forEach((word, order) => {
      const length = Array.from(word).length;
      const bucket = this.buckets.get(length);
      if (bucket) {
        bucket.push({ word, order });
      } else {
        this.buckets.set(length, [{ word, order }]);
      }
    });
  }

  candidates(token: string, maxEdits: number, costs: EditCosts): string[] {
    const cheapestLengthChange = Math.min(costs.insertCost, costs.deleteCost);
    if (cheapestLengthChange <= 0) {
      return this.linear.candidates(token, maxEdits, costs);
    }

    const length = Array.from(token).length;
    const spread = Math.floor(maxEdits / cheapestLengthChange);
    const matches: Array<{ word: string; order: number }> = [];

    for (let candidateLength = Math.max(0, length - spread); candidateLength <= length + spread; candidateLength += 1) {
      const bucket = this.buckets.get(candidateLength);
      if (!bucket) {
        continue;
      }
      for (const entry of bucket) {
        if (distanceWithCosts(token, entry.word, costs) <= maxEdits) {
          matches.push(entry);
        }
      }
    }

    return matches.sort((left, right) => left.order - right.order).map((entry) => entry.word);
  }
}

export function createCandidateIndex(vocabulary: Vocabulary, strategy: SearchStrategy): CandidateIndex {
  return strategy === "linear" ? new LinearScanIndex(vocabulary) : new LengthBucketIndex(vocabulary);
}
