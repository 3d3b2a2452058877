import { PlacedCell, isAlphanumeric, letterCell, pairWithSolution, solutionSymbols } from "./characters";

const keepAll = (): boolean => true;

/**
 * Letter-substitution alignment. Encoded punctuation and spacing are dropped;
 * every symbol cell is re-derived from the solution, the only text that
 * reliably carries them.
 */
export function alignLetters(encodedText: string, solution: readonly string[], puzzleId: string): PlacedCell[] {
  const tokens = Array.from(encodedText.toUpperCase()).filter(isAlphanumeric);
  const indices = pairWithSolution(tokens.length, solution, puzzleId);

  const placed: PlacedCell[] = [];
  let cursor = 0;

  tokens.forEach((token, i) => {
    const solutionIndex = indices[i];
    placed.push(...solutionSymbols(solution, cursor, solutionIndex, keepAll));
    placed.push(letterCell(token, solution[solutionIndex]));
    cursor = solutionIndex + 1;
  });

  placed.push(...solutionSymbols(solution, cursor, solution.length, keepAll));
  return placed;
}
