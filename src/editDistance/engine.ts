import { resolveEditCosts, type EditCosts, type EditCostsInput } from "./costs.js";
import {
  EditOperation,
  OPERATION_KINDS,
  OPERATION_SYMBOLS,
  type EditOperationRecord,
} from "./operations.js";

/** Placeholder shown in the top-left corner of the rendered backtrace grid. */
export const BACKTRACE_CORNER_SYMBOL = "#";

/**
 * Levenshtein engine keeping the full distance matrix and a parallel backtrace
 * matrix so the optimal edit path can be replayed after construction.
 *
 * Both strings are lowercased and handled as sequences of code points. The
 * matrices are filled once, in row-major order, and never mutated afterwards.
 * Distances live in a `Float64Array`, so long inputs cannot wrap around the
 * way a fixed-width counter would.
 *
 * When a mismatch has several equally small neighbours the engine prefers
 * Insert, then Delete, then Replace. The comparison is made on the neighbour
 * values before any cost is added.
 */
export class EditDistanceEngine {
  readonly source: string;
  readonly target: string;
  readonly costs: EditCosts;

  private readonly sourceChars: readonly string[];
  private readonly targetChars: readonly string[];
  private readonly rows: number;
  private readonly columns: number;
  private readonly distances: Float64Array;
  private readonly backtrace: Uint8Array;

  constructor(source: string, target: string, costs: EditCostsInput = {}) {
    this.costs = resolveEditCosts(costs);
    this.source = source.toLowerCase();
    this.target = target.toLowerCase();
    this.sourceChars = Array.from(this.source);
    this.targetChars = Array.from(this.target);
    this.rows = this.sourceChars.length + 1;
    this.columns = this.targetChars.length + 1;
    this.distances = new Float64Array(this.rows * this.columns);
    this.backtrace = new Uint8Array(this.rows * this.columns);
    this.build();
  }

  private index(row: number, column: number): number {
    return row * this.columns + column;
  }

  private build(): void {
    const { insertCost, deleteCost, replaceCost } = this.costs;

    for (let column = 0; column < this.columns; column += 1) {
      this.distances[this.index(0, column)] = column * insertCost;
      this.backtrace[this.index(0, column)] = EditOperation.Insert;
    }
    // Column 0 is written last so the unused corner cell carries Delete.
    for (let row = 0; row < this.rows; row += 1) {
      this.distances[this.index(row, 0)] = row * deleteCost;
      this.backtrace[this.index(row, 0)] = EditOperation.Delete;
    }

    for (let row = 1; row < this.rows; row += 1) {
      const sourceChar = this.sourceChars[row - 1];
      for (let column = 1; column < this.columns; column += 1) {
        const cell = this.index(row, column);
        const diagonal = this.distances[this.index(row - 1, column - 1)];

        if (sourceChar === this.targetChars[column - 1]) {
          this.distances[cell] = diagonal;
          this.backtrace[cell] = EditOperation.NoEdit;
          continue;
        }

        const left = this.distances[this.index(row, column - 1)];
        const up = this.distances[this.index(row - 1, column)];
        const minimum = Math.min(left, up, diagonal);

        if (minimum === left) {
          this.distances[cell] = minimum + insertCost;
          this.backtrace[cell] = EditOperation.Insert;
        } else if (minimum === up) {
          this.distances[cell] = minimum + deleteCost;
          this.backtrace[cell] = EditOperation.Delete;
        } else {
          this.distances[cell] = minimum + replaceCost;
          this.backtrace[cell] = EditOperation.Replace;
        }
      }
    }
  }

  /** Minimum cumulative cost transforming the source into the target. */
  getEditDistance(): number {
    return this.distances[this.index(this.rows - 1, this.columns - 1)];
  }

  /** Copy of the distance matrix, one array per source prefix length. */
  get distanceMatrix(): number[][] {
    return this.copyGrid((cell) => this.distances[cell]);
  }

  /** Copy of the backtrace matrix. */
  get backtraceMatrix(): EditOperation[][] {
    return this.copyGrid((cell) => this.readOperation(cell));
  }

  /**
   * Renders the backtrace as a grid of symbols (`N`, `I`, `D`, `R`). Row 0
   * carries the target characters, column 0 the source characters and the
   * corner holds {@link BACKTRACE_CORNER_SYMBOL}.
   */
  backtraceToAscii(): string[][] {
    const grid = this.copyGrid((cell) => OPERATION_SYMBOLS[this.readOperation(cell)]);
    for (let row = 0; row < this.rows; row += 1) {
      grid[row][0] = row > 0 ? this.sourceChars[row - 1] : BACKTRACE_CORNER_SYMBOL;
    }
    for (let column = 1; column < this.columns; column += 1) {
      grid[0][column] = this.targetChars[column - 1];
    }
    return grid;
  }

  /**
   * Walks the backtrace from the bottom-right cell to the origin and returns
   * the steps in forward order. Each call recomputes the list.
   */
  operationsHistory(): EditOperationRecord[] {
    const steps: EditOperationRecord[] = [];
    let row = this.rows - 1;
    let column = this.columns - 1;

    while (row > 0 || column > 0) {
      const operation = this.readOperation(this.index(row, column));
      switch (operation) {
        case EditOperation.Insert:
          steps.push(this.record(operation, null, column));
          column -= 1;
          break;
        case EditOperation.Delete:
          steps.push(this.record(operation, row, null));
          row -= 1;
          break;
        case EditOperation.Replace:
        case EditOperation.NoEdit:
          steps.push(this.record(operation, row, column));
          row -= 1;
          column -= 1;
          break;
      }
    }

    return steps.reverse();
  }

  private record(operation: EditOperation, sourceIndex: number | null, targetIndex: number | null): EditOperationRecord {
    return {
      operation: OPERATION_KINDS[operation],
      sourceIndex,
      targetIndex,
      sourceChar: sourceIndex === null ? null : this.sourceChars[sourceIndex - 1],
      targetChar: targetIndex === null ? null : this.targetChars[targetIndex - 1],
    };
  }

  private readOperation(cell: number): EditOperation {
    switch (this.backtrace[cell]) {
      case EditOperation.Insert:
        return EditOperation.Insert;
      case EditOperation.Delete:
        return EditOperation.Delete;
      case EditOperation.Replace:
        return EditOperation.Replace;
      default:
        return EditOperation.NoEdit;
    }
  }

  private copyGrid<T>(read: (cell: number) => T): T[][] {
    const grid: T[][] = [];
    for (let row = 0; row < this.rows; row += 1) {
      const line: T[] = [];
      for (let column = 0; column < this.columns; column += 1) {
        line.push(read(this.index(row, column)));
      }
      grid.push(line);
    }
    return grid;
  }
}
