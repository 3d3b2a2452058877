import { PuzzleSession, createSession } from "@cipherquote/core";
import { Clock } from "./interfaces/collaborators";

/**
 * Start/end/pause bookkeeping for one puzzle session. Elapsed time is
 * computed on read from the injected clock; nothing here runs on a timer.
 */
export class SessionTracker {
  private session: PuzzleSession;
  private clock: Clock;

  constructor(clock: Clock, session: PuzzleSession = createSession()) {
    this.clock = clock;
    this.session = { ...session };
  }

  get data(): Readonly<PuzzleSession> {
    return this.session;
  }

  get hasStarted(): boolean {
    return this.session.startTime !== null;
  }

  get isTerminal(): boolean {
    return this.session.isComplete || this.session.isFailed;
  }

  /** Starts the clock on the first interaction. Returns true if it started now. */
  start(): boolean {
    if (this.session.startTime !== null) return false;
    this.session.startTime = this.clock.now();
    return true;
  }

  select(index: number | null): void {
    this.session.selectedCellIndex = index;
  }

  addMistake(): number {
    this.session.mistakeCount += 1;
    return this.session.mistakeCount;
  }

  addHint(): number {
    this.session.hintCount += 1;
    return this.session.hintCount;
  }

  markComplete(): void {
    this.closePause();
    this.session.isComplete = true;
    this.session.isFailed = false;
    if (this.session.endTime === null) this.session.endTime = this.clock.now();
  }

  markFailed(): void {
    this.closePause();
    this.session.isFailed = true;
    this.session.isComplete = false;
    if (this.session.endTime === null) this.session.endTime = this.clock.now();
  }

  /**
   * Continue after a failure. Mistakes are kept but no longer fail the
   * session, and the clock runs again from where it stopped.
   */
  clearFailureState(): boolean {
    if (!this.session.isFailed) return false;
    const { startTime, endTime } = this.session;
    if (startTime !== null && endTime !== null) {
      // the gap between failing and continuing is not play time
      this.session.totalPausedDuration += this.clock.now() - endTime;
    }
    this.session.isFailed = false;
    this.session.hasContinuedAfterFailure = true;
    this.session.endTime = null;
    return true;
  }

  /** Only a started, unfinished session can pause. Returns true if toggled. */
  togglePause(): boolean {
    if (!this.hasStarted || this.isTerminal) return false;

    if (this.session.isPaused) {
      this.closePause();
    } else {
      this.session.isPaused = true;
      this.session.pauseStartTime = this.clock.now();
    }
    return true;
  }

  /** Milliseconds of play: pauses excluded, 0 before the first interaction. */
  elapsedTime(): number {
    const { startTime, endTime, totalPausedDuration, isPaused, pauseStartTime } = this.session;
    if (startTime === null) return 0;

    const end = endTime ?? this.clock.now();
    const openPause = isPaused && pauseStartTime !== null ? end - pauseStartTime : 0;
    return Math.max(0, end - startTime - totalPausedDuration - openPause);
  }

  completionTime(): number | null {
    return this.isTerminal ? this.elapsedTime() : null;
  }

  snapshot(): PuzzleSession {
    return { ...this.session };
  }

  private closePause(): void {
    if (!this.session.isPaused) return;
    if (this.session.pauseStartTime !== null) {
      this.session.totalPausedDuration += this.clock.now() - this.session.pauseStartTime;
    }
    this.session.isPaused = false;
    this.session.pauseStartTime = null;
  }
}
