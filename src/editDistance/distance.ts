import { resolveEditCosts, type EditCosts, type EditCostsInput } from "./costs.js";

/**
 * Compute the edit distance between two strings without keeping the backtrace.
 *
 * The recurrence, the lowercasing and the Insert > Delete > Replace preference
 * are the ones used by {@link EditDistanceEngine}, so both always return the
 * same value. Only two rows of the matrix are kept in memory at any time,
 * which is what the spelling corrector needs when it scans a vocabulary.
 */
export function computeEditDistance(source: string, target: string, costs: EditCostsInput = {}): number {
  return distanceWithCosts(source, target, resolveEditCosts(costs));
}

/** Variant of {@link computeEditDistance} taking already validated costs. */
export function distanceWithCosts(source: string, target: string, costs: EditCosts): number {
  const a = Array.from(source.toLowerCase());
  const b = Array.from(target.toLowerCase());
  const { insertCost, deleteCost, replaceCost } = costs;

  let previousRow = new Float64Array(b.length + 1);
  let currentRow = new Float64Array(b.length + 1);

  for (let column = 0; column <= b.length; column += 1) {
    previousRow[column] = column * insertCost;
  }

  for (let row = 1; row <= a.length; row += 1) {
    currentRow[0] = row * deleteCost;
    const charA = a[row - 1];

    for (let column = 1; column <= b.length; column += 1) {
      const diagonal = previousRow[column - 1];
      if (charA === b[column - 1]) {
        currentRow[column] = diagonal;
        continue;
      }

      const left = currentRow[column - 1];
      const up = previousRow[column];
      const minimum = Math.min(left, up, diagonal);

      if (minimum === left) {
        currentRow[column] = minimum + insertCost;
      } else if (minimum === up) {
        currentRow[column] = minimum + deleteCost;
      } else {
        currentRow[column] = minimum + replaceCost;
      }
    }

    // Swap the buffers so the freshly computed row becomes the baseline.
    const nextPrevious = currentRow;
    currentRow = previousRow;
    previousRow = nextPrevious;
  }

  return previousRow[b.length];
}
