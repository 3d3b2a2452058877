import { PlacedCell, isWhitespace, letterCell, pairWithSolution, solutionSymbols, symbolCell } from "./characters";

export type NumberToken = { kind: "number"; value: string } | { kind: "symbol"; value: string };

const DIGITS = /^\p{N}+$/u;

/**
 * Split number-encoded text into tokens. Whitespace only delimits; inside a
 * component, digit runs are numbers and every other character is a symbol,
 * so "12," yields the number 12 followed by ",".
 */
export function tokenizeNumbers(encodedText: string): NumberToken[] {
  const tokens: NumberToken[] = [];
  for (const component of encodedText.split(/\s+/u)) {
    for (const run of component.match(/\p{N}+|\P{N}/gu) ?? []) {
      tokens.push(DIGITS.test(run) ? { kind: "number", value: run } : { kind: "symbol", value: run });
    }
  }
  return tokens;
}

/**
 * Number-substitution alignment. Encoded punctuation is kept verbatim in
 * encoded order; only word spacing is synthesized from the solution.
 */
export function alignNumbers(encodedText: string, solution: readonly string[], puzzleId: string): PlacedCell[] {
  const tokens = tokenizeNumbers(encodedText);
  const numberCount = tokens.filter((t) => t.kind === "number").length;
  const indices = pairWithSolution(numberCount, solution, puzzleId);

  const placed: PlacedCell[] = [];
  let cursor = 0;
  let paired = 0;

  for (const token of tokens) {
    if (token.kind === "symbol") {
      placed.push(symbolCell(token.value));
      continue;
    }
    const solutionIndex = indices[paired++];
    placed.push(...solutionSymbols(solution, cursor, solutionIndex, isWhitespace));
    placed.push(letterCell(token.value, solution[solutionIndex]));
    cursor = solutionIndex + 1;
  }

  placed.push(...solutionSymbols(solution, cursor, solution.length, isWhitespace));
  return placed;
}
