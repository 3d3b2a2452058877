import { Cell, ENCODING_SCHEMES, EncodingScheme, deriveCellId } from "@cipherquote/core";
import { AlignmentError } from "../errors";
import { alignLetters } from "./letters";
import { alignNumbers } from "./numbers";

export interface AlignmentInput {
  encodedText: string;
  solutionText: string;
  scheme: EncodingScheme;
  puzzleId: string;
}

/**
 * Align an encoded quote with its solution into the canonical cell sequence.
 * Throws AlignmentError for malformed content; never returns a partial list.
 */
export function alignPuzzle(input: AlignmentInput): Cell[] {
  if (!ENCODING_SCHEMES.includes(input.scheme)) {
    throw new AlignmentError("UNSUPPORTED_SCHEME", input.puzzleId, `Unsupported encoding scheme: ${input.scheme}`);
  }
  const solution = Array.from(input.solutionText.toUpperCase());
  const placed =
    input.scheme === "letters"
      ? alignLetters(input.encodedText, solution, input.puzzleId)
      : alignNumbers(input.encodedText, solution, input.puzzleId);

  return placed.map((cell, position) => ({
    id: deriveCellId({ puzzleId: input.puzzleId, position, ...cell }),
    position,
    encodedToken: cell.encodedToken,
    solutionChar: cell.solutionChar,
    isSymbol: cell.isSymbol,
    userInput: "",
    isRevealed: false,
    isPreFilled: false,
    isError: false,
  }));
}

export { tokenizeNumbers } from "./numbers";
export type { NumberToken } from "./numbers";
