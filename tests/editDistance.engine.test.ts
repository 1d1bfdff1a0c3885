import { describe, it } from "mocha";
import { expect } from "chai";

import { EditDistanceEngine } from "../src/editDistance/engine.js";
import { EditOperation, applyOperations } from "../src/editDistance/operations.js";
import { InvalidConfigurationError } from "../src/errors.js";

const { NoEdit: N, Insert: I, Delete: D, Replace: R } = EditOperation;

/**
 * Matrices for "elephant" -> "relevant" under unit costs, computed by hand row
 * by row with the Insert > Delete > Replace preference on ties.
 */
const ELEPHANT_DISTANCES = [
  [0, 1, 2, 3, 4, 5, 6, 7, 8],
  [1, 1, 1, 2, 3, 4, 5, 6, 7],
  [2, 2, 2, 1, 2, 3, 4, 5, 6],
  [3, 3, 2, 2, 1, 2, 3, 4, 5],
  [4, 4, 3, 3, 2, 2, 3, 4, 5],
  [5, 5, 4, 4, 3, 3, 3, 4, 5],
  [6, 6, 5, 5, 4, 4, 3, 4, 5],
  [7, 7, 6, 6, 5, 5, 4, 3, 4],
  [8, 8, 7, 7, 6, 6, 5, 4, 3],
];

const ELEPHANT_BACKTRACE = [
  [D, I, I, I, I, I, I, I, I],
  [D, R, N, I, N, I, I, I, I],
  [D, D, D, N, I, I, I, I, I],
  [D, D, N, D, N, I, I, I, I],
  [D, D, D, D, D, R, I, I, I],
  [D, D, D, D, D, D, R, I, I],
  [D, D, D, D, D, D, N, I, I],
  [D, D, D, D, D, D, D, N, I],
  [D, D, D, D, D, D, D, D, N],
];

describe("EditDistanceEngine", () => {
  describe("Elephant -> relevant", () => {
    const engine = new EditDistanceEngine("Elephant", "relevant");

    it("lowercases both strings before comparing them", () => {
      expect(engine.source).to.equal("elephant");
      expect(engine.target).to.equal("relevant");
    });

    it("reports an edit distance of three", () => {
      expect(engine.getEditDistance()).to.equal(3);
    });

    it("fills the distance matrix cell by cell", () => {
      expect(engine.distanceMatrix).to.deep.equal(ELEPHANT_DISTANCES);
    });

    it("fills the backtrace matrix cell by cell", () => {
      expect(engine.backtraceMatrix).to.deep.equal(ELEPHANT_BACKTRACE);
    });

    it("renders the backtrace with characters on the borders", () => {
      const grid = engine.backtraceToAscii();
      expect(grid[0]).to.deep.equal(["#", "r", "e", "l", "e", "v", "a", "n", "t"]);
      expect(grid.map((row) => row[0])).to.deep.equal(["#", "e", "l", "e", "p", "h", "a", "n", "t"]);
      expect(grid[4]).to.deep.equal(["p", "D", "D", "D", "D", "R", "I", "I", "I"]);
      expect(grid[8]).to.deep.equal(["t", "D", "D", "D", "D", "D", "D", "D", "N"]);
    });

    it("leaves the backtrace matrix untouched when rendering", () => {
      engine.backtraceToAscii();
      expect(engine.backtraceMatrix[0][3]).to.equal(EditOperation.Insert);
      expect(engine.backtraceMatrix[3][0]).to.equal(EditOperation.Delete);
    });

    it("walks the backtrace into a forward operation history", () => {
      expect(engine.operationsHistory()).to.deep.equal([
        { operation: "inserting", sourceIndex: null, targetIndex: 1, sourceChar: null, targetChar: "r" },
        { operation: "no_edit", sourceIndex: 1, targetIndex: 2, sourceChar: "e", targetChar: "e" },
        { operation: "no_edit", sourceIndex: 2, targetIndex: 3, sourceChar: "l", targetChar: "l" },
        { operation: "no_edit", sourceIndex: 3, targetIndex: 4, sourceChar: "e", targetChar: "e" },
        { operation: "replacing", sourceIndex: 4, targetIndex: 5, sourceChar: "p", targetChar: "v" },
        { operation: "deleting", sourceIndex: 5, targetIndex: null, sourceChar: "h", targetChar: null },
        { operation: "no_edit", sourceIndex: 6, targetIndex: 6, sourceChar: "a", targetChar: "a" },
        { operation: "no_edit", sourceIndex: 7, targetIndex: 7, sourceChar: "n", targetChar: "n" },
        { operation: "no_edit", sourceIndex: 8, targetIndex: 8, sourceChar: "t", targetChar: "t" },
      ]);
    });

    it("recomputes the history on every call", () => {
      const first = engine.operationsHistory();
      first.pop();
      expect(engine.operationsHistory()).to.have.length(9);
    });
  });

  describe("tie-breaking", () => {
    it("prefers Insert when all three neighbours are equal", () => {
      const engine = new EditDistanceEngine("ab", "ba");
      expect(engine.backtraceMatrix[2][2]).to.equal(EditOperation.Insert);
      expect(engine.getEditDistance()).to.equal(2);
      expect(engine.operationsHistory().map((step) => step.operation)).to.deep.equal([
        "deleting",
        "no_edit",
        "inserting",
      ]);
    });

    it("prefers Delete over Replace when the upper and diagonal neighbours tie", () => {
      const engine = new EditDistanceEngine("ab", "c");
      expect(engine.distanceMatrix).to.deep.equal([
        [0, 1],
        [1, 1],
        [2, 2],
      ]);
      expect(engine.backtraceMatrix[2][1]).to.equal(EditOperation.Delete);
      expect(engine.operationsHistory()).to.deep.equal([
        { operation: "replacing", sourceIndex: 1, targetIndex: 1, sourceChar: "a", targetChar: "c" },
        { operation: "deleting", sourceIndex: 2, targetIndex: null, sourceChar: "b", targetChar: null },
      ]);
    });

    it("compares neighbour values before adding costs", () => {
      // The diagonal neighbour is the smallest, so Replace is taken even though
      // inserting then deleting would be cheaper with these costs.
      const engine = new EditDistanceEngine("a", "b", { replaceCost: 5 });
      expect(engine.backtraceMatrix[1][1]).to.equal(EditOperation.Replace);
      expect(engine.getEditDistance()).to.equal(5);
    });
  });

  describe("identity and base cases", () => {
    it("returns zero and only no_edit steps for identical strings", () => {
      const engine = new EditDistanceEngine("Banks", "banks");
      expect(engine.getEditDistance()).to.equal(0);
      const kinds = new Set(engine.operationsHistory().map((step) => step.operation));
      expect([...kinds]).to.deep.equal(["no_edit"]);
    });

    it("charges insertions only when the source is empty", () => {
      const engine = new EditDistanceEngine("", "abc", { insertCost: 2 });
      expect(engine.getEditDistance()).to.equal(6);
      expect(engine.operationsHistory().map((step) => step.targetChar)).to.deep.equal(["a", "b", "c"]);
    });

    it("charges deletions only when the target is empty", () => {
      const engine = new EditDistanceEngine("abcd", "", { deleteCost: 3 });
      expect(engine.getEditDistance()).to.equal(12);
      expect(engine.operationsHistory().map((step) => step.operation)).to.deep.equal([
        "deleting",
        "deleting",
        "deleting",
        "deleting",
      ]);
    });

    it("handles two empty strings", () => {
      const engine = new EditDistanceEngine("", "");
      expect(engine.getEditDistance()).to.equal(0);
      expect(engine.operationsHistory()).to.deep.equal([]);
      expect(engine.backtraceToAscii()).to.deep.equal([["#"]]);
    });

    it("does not add a cost on matching characters even with a zero replace cost", () => {
      const engine = new EditDistanceEngine("abc", "abc", { replaceCost: 0 });
      expect(engine.getEditDistance()).to.equal(0);
    });

    it("does not wrap around for long inputs", () => {
      const engine = new EditDistanceEngine("a".repeat(300), "");
      expect(engine.getEditDistance()).to.equal(300);
    });
  });

  describe("symmetry", () => {
    it("is symmetric when insert and delete costs are equal", () => {
      const forward = new EditDistanceEngine("kitten", "sitting", { insertCost: 2, deleteCost: 2 });
      const backward = new EditDistanceEngine("sitting", "kitten", { insertCost: 2, deleteCost: 2 });
      expect(forward.getEditDistance()).to.equal(backward.getEditDistance());
    });

    it("is asymmetric when insert and delete costs differ", () => {
      const forward = new EditDistanceEngine("", "abc", { insertCost: 1, deleteCost: 4 });
      const backward = new EditDistanceEngine("abc", "", { insertCost: 1, deleteCost: 4 });
      expect(forward.getEditDistance()).to.equal(3);
      expect(backward.getEditDistance()).to.equal(12);
    });
  });

  it("replays its own history into the target", () => {
    for (const [source, target] of [
      ["Elephant", "relevant"],
      ["kitten", "sitting"],
      ["strongss", "strong"],
      ["", "abc"],
      ["flaw", "lawn"],
    ]) {
      const engine = new EditDistanceEngine(source, target, { replaceCost: 2 });
      expect(applyOperations(engine.source, engine.operationsHistory())).to.equal(engine.target);
    }
  });

  it("rejects negative costs", () => {
    expect(() => new EditDistanceEngine("a", "b", { deleteCost: -1 })).to.throw(InvalidConfigurationError);
  });
});
