import { randomUUID } from "crypto";
import { TerminalSnapshot } from "@cipherquote/core";
import { Logger, ProgressSink, log as engineLog } from "@cipherquote/engine";
import { ProgressStore, PuzzleAttempt } from "./types";

export interface AttemptRecorderOptions {
  logger?: Logger;
  /** Defaults to random UUIDs */
  newId?: () => string;
}

export function toAttempt(snapshot: TerminalSnapshot, attemptId: string): PuzzleAttempt {
  return {
    attemptId,
    puzzleId: snapshot.puzzleId,
    scheme: snapshot.scheme,
    mode: snapshot.mode,
    completedAt: snapshot.isComplete ? snapshot.finishedAt : null,
    failedAt: snapshot.isComplete ? null : snapshot.finishedAt,
    completionTime: snapshot.isComplete ? snapshot.elapsedTime : null,
    hintCount: snapshot.hintCount,
    mistakeCount: snapshot.mistakeCount,
  };
}

/**
 * Progress sink that turns each terminal snapshot into a logged attempt.
 */
export class AttemptRecorder implements ProgressSink {
  private store: ProgressStore;
  private log: Logger;
  private newId: () => string;

  constructor(store: ProgressStore, opts: AttemptRecorderOptions = {}) {
    this.store = store;
    this.log = (opts.logger ?? engineLog).child({ component: "progress" });
    this.newId = opts.newId ?? randomUUID;
  }

  record(snapshot: TerminalSnapshot): void {
    const attempt = toAttempt(snapshot, this.newId());
    this.store.logAttempt(attempt);
    this.log.info(
      {
        puzzleId: attempt.puzzleId,
        attemptId: attempt.attemptId,
        outcome: snapshot.isComplete ? "completed" : "failed",
      },
      "Attempt recorded"
    );
  }
}
