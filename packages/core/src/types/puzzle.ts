import { Cell, EncodingScheme } from "./cell";
import { PuzzleSession } from "./session";

export type DifficultyMode = "normal" | "expert";

export const DIFFICULTY_MODES: readonly DifficultyMode[] = ["normal", "expert"];

export interface DifficultyConfig {
  /** "normal" pre-fills part of the board at start, "expert" does not */
  mode: DifficultyMode;
  /** Fraction of distinct solution letters to pre-fill */
  prefillFraction: number;
  /** Wrong inputs allowed before the session fails */
  maxMistakes: number;
}

export const DEFAULT_DIFFICULTY: DifficultyConfig = {
  mode: "normal",
  prefillFraction: 0.2,
  maxMistakes: 3,
};

/** An encoded quote as supplied by a puzzle source. */
export interface PuzzleDefinition {
  puzzleId: string;
  encodedText: string;
  solutionText: string;
  scheme: EncodingScheme;
  author?: string;
  hint?: string;
  /** Content rating from the source, e.g. "Medium" */
  difficulty?: string;
}

/** Full live state handed to persistence for resumable sessions. */
export interface GameSnapshot {
  puzzleId: string;
  scheme: EncodingScheme;
  cells: Cell[];
  session: PuzzleSession;
}

/** Emitted once per terminal transition to the progress sink. */
export interface TerminalSnapshot {
  puzzleId: string;
  scheme: EncodingScheme;
  mode: DifficultyMode;
  isComplete: boolean;
  mistakeCount: number;
  hintCount: number;
  /** Milliseconds, pauses excluded */
  elapsedTime: number;
  finishedAt: number;
}
