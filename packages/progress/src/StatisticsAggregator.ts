import { EncodingScheme } from "@cipherquote/core";
import { ProgressStore } from "./types";

/**
 * Read-side statistics over every logged attempt. Values are computed on
 * each read, so they always reflect the store.
 */
export class StatisticsAggregator {
  private store: ProgressStore;

  constructor(store: ProgressStore) {
    this.store = store;
  }

  get totalAttempts(): number {
    return this.store.allAttempts().length;
  }

  get totalCompletions(): number {
    return this.store.allAttempts().filter((a) => a.completedAt !== null).length;
  }

  get totalFailures(): number {
    return this.store.allAttempts().filter((a) => a.failedAt !== null).length;
  }

  /** Whole percent, rounded down; 0 with no attempts */
  get winRatePercentage(): number {
    const total = this.totalAttempts;
    if (total === 0) return 0;
    return Math.floor((this.totalCompletions / total) * 100);
  }

  get globalBestTime(): number | null {
    const times = this.completionTimes();
    return times.length > 0 ? Math.min(...times) : null;
  }

  get averageTime(): number | null {
    const times = this.completionTimes();
    if (times.length === 0) return null;
    return times.reduce((sum, t) => sum + t, 0) / times.length;
  }

  completionCount(puzzleId: string, scheme: EncodingScheme): number {
    return this.store.attempts(puzzleId, scheme).filter((a) => a.completedAt !== null).length;
  }

  failureCount(puzzleId: string, scheme: EncodingScheme): number {
    return this.store.attempts(puzzleId, scheme).filter((a) => a.failedAt !== null).length;
  }

  bestTime(puzzleId: string, scheme: EncodingScheme): number | null {
    return this.store.bestCompletionTime(puzzleId, scheme);
  }

  completedPuzzleIds(scheme: EncodingScheme): Set<string> {
    return new Set(
      this.store
        .allAttempts()
        .filter((a) => a.scheme === scheme && a.completedAt !== null)
        .map((a) => a.puzzleId)
    );
  }

  resetAllStatistics(): void {
    this.store.clearAllProgress();
  }

  private completionTimes(): number[] {
    return this.store
      .allAttempts()
      .map((a) => a.completionTime)
      .filter((t): t is number => t !== null);
  }
}
