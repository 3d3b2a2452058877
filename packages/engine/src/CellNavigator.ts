import { Cell } from "@cipherquote/core";

export type Direction = 1 | -1;

/** Read access to the live cell array, owned by the state machine. */
export interface CellBoard {
  readonly cells: readonly Readonly<Cell>[];
}

/**
 * Cursor movement across non-symbol cells. Manual navigation and the
 * auto-advance after input or a hint both go through nextEligibleIndex,
 * so the cursor never rests on a symbol cell.
 */
export class CellNavigator {
  private board: CellBoard;

  constructor(board: CellBoard) {
    this.board = board;
  }

  /** First non-symbol index strictly past `from` in `direction`, or null. */
  nextEligibleIndex(from: number, direction: Direction): number | null {
    const cells = this.board.cells;
    for (let i = from + direction; i >= 0 && i < cells.length; i += direction) {
      if (!cells[i].isSymbol) return i;
    }
    return null;
  }

  firstEligibleIndex(): number | null {
    return this.nextEligibleIndex(-1, 1);
  }

  /** Target of a manual left/right move; with no selection, the first cell. */
  adjacentIndex(current: number | null, direction: Direction): number | null {
    if (current === null) return this.firstEligibleIndex();
    return this.nextEligibleIndex(current, direction);
  }
}
