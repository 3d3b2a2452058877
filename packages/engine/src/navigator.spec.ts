import { strict as assert } from "assert";
import { CellNavigator } from "./CellNavigator";
import { alignPuzzle } from "./alignment";

// Cells: 0 H, 1 I, 2 ",", 3 " ", 4 J, 5 K
const board = {
  cells: alignPuzzle({ encodedText: "AB CD", solutionText: "HI, JK", scheme: "letters", puzzleId: "nav" }),
};

describe("CellNavigator", () => {
  const navigator = new CellNavigator(board);

  it("skips symbol cells going forward", () => {
    assert.equal(navigator.nextEligibleIndex(0, 1), 1);
    assert.equal(navigator.nextEligibleIndex(1, 1), 4);
  });

  it("skips symbol cells going backward", () => {
    assert.equal(navigator.nextEligibleIndex(4, -1), 1);
  });

  it("returns null past either end", () => {
    assert.equal(navigator.nextEligibleIndex(5, 1), null);
    assert.equal(navigator.nextEligibleIndex(0, -1), null);
  });

  it("starts scanning just past a symbol index", () => {
    assert.equal(navigator.nextEligibleIndex(2, 1), 4);
    assert.equal(navigator.nextEligibleIndex(3, -1), 1);
  });

  it("finds the first eligible cell", () => {
    const leading = new CellNavigator({
      cells: alignPuzzle({ encodedText: "X", solutionText: "\"Q", scheme: "letters", puzzleId: "lead" }),
    });
    assert.equal(leading.firstEligibleIndex(), 1);
    assert.equal(navigator.firstEligibleIndex(), 0);
  });

  it("adjacentIndex starts at the first cell without a selection", () => {
    assert.equal(navigator.adjacentIndex(null, 1), 0);
    assert.equal(navigator.adjacentIndex(null, -1), 0);
    assert.equal(navigator.adjacentIndex(1, 1), 4);
  });
});
