import { EncodingScheme } from "@cipherquote/core";
import { ProgressStore, PuzzleAttempt } from "./types";

function finishedAt(attempt: PuzzleAttempt): number {
  return attempt.completedAt ?? attempt.failedAt ?? Number.NEGATIVE_INFINITY;
}

export class MemoryProgressStore implements ProgressStore {
  private log: PuzzleAttempt[] = [];

  logAttempt(attempt: PuzzleAttempt): void {
    this.log.push({ ...attempt });
  }

  attempts(puzzleId: string, scheme?: EncodingScheme): PuzzleAttempt[] {
    return this.log
      .filter((a) => a.puzzleId === puzzleId && (scheme === undefined || a.scheme === scheme))
      .map((a) => ({ ...a }));
  }

  /** Most recently finished attempt; on a tie the one logged last wins. */
  latestAttempt(puzzleId: string, scheme?: EncodingScheme): PuzzleAttempt | null {
    let latest: PuzzleAttempt | null = null;
    for (const attempt of this.attempts(puzzleId, scheme)) {
      if (latest === null || finishedAt(attempt) >= finishedAt(latest)) latest = attempt;
    }
    return latest;
  }

  bestCompletionTime(puzzleId: string, scheme?: EncodingScheme): number | null {
    const times = this.attempts(puzzleId, scheme)
      .map((a) => a.completionTime)
      .filter((t): t is number => t !== null);
    return times.length > 0 ? Math.min(...times) : null;
  }

  allAttempts(): PuzzleAttempt[] {
    return this.log.map((a) => ({ ...a }));
  }

  clearAllProgress(): void {
    this.log = [];
  }
}
