import { AlignmentError } from "../errors";

const LETTER = /^\p{L}$/u;
const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;
const WHITESPACE = /^\s$/u;

export const isLetter = (ch: string): boolean => LETTER.test(ch);
export const isAlphanumeric = (ch: string): boolean => ALPHANUMERIC.test(ch);
export const isWhitespace = (ch: string): boolean => WHITESPACE.test(ch);

/** A cell before positions and ids are assigned. */
export interface PlacedCell {
  encodedToken: string;
  solutionChar: string | null;
  isSymbol: boolean;
}

export function letterCell(encodedToken: string, solutionChar: string): PlacedCell {
  return { encodedToken, solutionChar, isSymbol: false };
}

export function symbolCell(ch: string): PlacedCell {
  return { encodedToken: ch, solutionChar: null, isSymbol: true };
}

/**
 * Pair `tokenCount` encoded tokens, in order, with the solution's letters.
 * Returns the solution index each token resolves to.
 */
export function pairWithSolution(tokenCount: number, solution: readonly string[], puzzleId: string): number[] {
  const letterIndices: number[] = [];
  solution.forEach((ch, i) => {
    if (isLetter(ch)) letterIndices.push(i);
  });

  if (letterIndices.length === 0) {
    throw new AlignmentError("EMPTY_SOLUTION", puzzleId, `Puzzle ${puzzleId} has no letters in its solution`);
  }
  if (tokenCount === 0) {
    throw new AlignmentError("EMPTY_ENCODED_TEXT", puzzleId, `Puzzle ${puzzleId} has no encoded tokens`);
  }
  if (tokenCount > letterIndices.length) {
    throw new AlignmentError(
      "INSUFFICIENT_SOLUTION_LETTERS",
      puzzleId,
      `Puzzle ${puzzleId} encodes ${tokenCount} tokens but its solution has only ${letterIndices.length} letters`
    );
  }

  return letterIndices.slice(0, tokenCount);
}

/**
 * Symbol cells for the non-letter solution characters in [from, to) that
 * `keep` accepts. Letters in the range are skipped.
 */
export function solutionSymbols(
  solution: readonly string[],
  from: number,
  to: number,
  keep: (ch: string) => boolean
): PlacedCell[] {
  const out: PlacedCell[] = [];
  for (let i = from; i < to; i++) {
    const ch = solution[i];
    if (!isLetter(ch) && keep(ch)) out.push(symbolCell(ch));
  }
  return out;
}
