import { DifficultyMode, EncodingScheme } from "@cipherquote/core";

/** One finished play of a puzzle. Exactly one of completedAt/failedAt is set. */
export interface PuzzleAttempt {
  attemptId: string;
  puzzleId: string;
  scheme: EncodingScheme;
  mode: DifficultyMode;
  completedAt: number | null;
  failedAt: number | null;
  /** Milliseconds played; null for failures */
  completionTime: number | null;
  hintCount: number;
  mistakeCount: number;
}

export interface ProgressStore {
  logAttempt(attempt: PuzzleAttempt): void;
  /** Attempts for one puzzle in logging order, optionally for one scheme */
  attempts(puzzleId: string, scheme?: EncodingScheme): PuzzleAttempt[];
  latestAttempt(puzzleId: string, scheme?: EncodingScheme): PuzzleAttempt | null;
  bestCompletionTime(puzzleId: string, scheme?: EncodingScheme): number | null;
  allAttempts(): PuzzleAttempt[];
  clearAllProgress(): void;
}
