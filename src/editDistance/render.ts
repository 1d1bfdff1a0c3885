/** Cell values accepted by {@link formatGrid}. */
export type GridCell = string | number;

/**
 * Formats a rectangular grid as aligned text, one line per row. Every column
 * is right-aligned to the widest cell of the whole grid.
 */
export function formatGrid(grid: ReadonlyArray<ReadonlyArray<GridCell>>): string {
  const cells = grid.map((row) => row.map((cell) => String(cell)));
  let width = 1;
  for (const row of cells) {
    for (const cell of row) {
      width = Math.max(width, cell.length);
    }
  }
  return cells.map((row) => row.map((cell) => cell.padStart(width)).join(" ")).join("\n");
}

/**
 * Prefixes a distance matrix with its characters so it reads like the
 * backtrace grid: target characters on top, source characters on the left.
 */
export function labelDistanceMatrix(
  matrix: ReadonlyArray<ReadonlyArray<number>>,
  source: string,
  target: string,
): GridCell[][] {
  const sourceChars = Array.from(source);
  const header: GridCell[] = [" ", " ", ...Array.from(target)];
  const rows = matrix.map((row, index): GridCell[] => [index > 0 ? sourceChars[index - 1] : " ", ...row]);
  return [header, ...rows];
}
