/** Substitution alphabet a puzzle is encoded with. */
export type EncodingScheme = "letters" | "numbers";

export const ENCODING_SCHEMES: readonly EncodingScheme[] = ["letters", "numbers"];

/**
 * One rendered position of a cryptogram.
 *
 * Symbol cells (spaces, punctuation) never carry a solution letter and never
 * hold input; they are excluded from progress, completion and mistakes.
 */
export interface Cell {
  /** Deterministic id derived from puzzle id, position and content */
  id: string;
  /** Dense 0-based index in the cell sequence */
  position: number;
  /** Encoded letter, number string, or a single symbol character */
  encodedToken: string;
  /** Uppercase plaintext letter, null for symbol cells */
  solutionChar: string | null;
  isSymbol: boolean;
  /** Player's guess: "" or one uppercase character */
  userInput: string;
  /** Filled by a hint */
  isRevealed: boolean;
  /** Filled by the difficulty pre-fill at puzzle start */
  isPreFilled: boolean;
  /** Last validation marked the input wrong */
  isError: boolean;
}

export function isCellEmpty(cell: Cell): boolean {
  return cell.userInput === "";
}

/** Symbol cells count as correct so they never block completion. */
export function isCellCorrect(cell: Cell): boolean {
  if (cell.isSymbol || cell.solutionChar === null) return true;
  return cell.userInput.toUpperCase() === cell.solutionChar.toUpperCase();
}

/** Hint and pre-fill cells are locked against further input. */
export function isCellEditable(cell: Cell): boolean {
  return !cell.isSymbol && !cell.isRevealed && !cell.isPreFilled;
}

export function cloneCells(cells: readonly Cell[]): Cell[] {
  return cells.map((cell) => ({ ...cell }));
}
