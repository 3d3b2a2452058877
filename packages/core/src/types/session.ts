/** One attempt at a puzzle. Timestamps are epoch milliseconds. */
export interface PuzzleSession {
  /** Unset until the first input or hint */
  startTime: number | null;
  /** Set once on completion or failure */
  endTime: number | null;
  mistakeCount: number;
  hintCount: number;
  selectedCellIndex: number | null;
  isComplete: boolean;
  isFailed: boolean;
  isPaused: boolean;
  pauseStartTime: number | null;
  /** Accumulated pause time excluded from elapsed time */
  totalPausedDuration: number;
  /** The player chose to keep going after failing; mistakes no longer fail */
  hasContinuedAfterFailure: boolean;
}

export type GamePhase = "idle" | "active" | "completed" | "failed";

export function createSession(): PuzzleSession {
  return {
    startTime: null,
    endTime: null,
    mistakeCount: 0,
    hintCount: 0,
    selectedCellIndex: null,
    isComplete: false,
    isFailed: false,
    isPaused: false,
    pauseStartTime: null,
    totalPausedDuration: 0,
    hasContinuedAfterFailure: false,
  };
}
