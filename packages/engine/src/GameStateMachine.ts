import {
  Cell,
  DifficultyConfig,
  GameEvent,
  GamePhase,
  GameSnapshot,
  PuzzleDefinition,
  PuzzleSession,
  SessionTranscript,
  TerminalSnapshot,
  TranscriptBuilder,
  TranscriptEntry,
  cloneCells,
  isCellCorrect,
  isCellEditable,
  isCellEmpty,
} from "@cipherquote/core";
import { alignPuzzle } from "./alignment";
import { isLetter, isWhitespace } from "./alignment/characters";
import { CellBoard, CellNavigator, Direction } from "./CellNavigator";
import { SessionTracker } from "./SessionTracker";
import { applyPrefill } from "./prefill";
import { mathRandomSource, pickRandom } from "./prng";
import { Clock, ProgressSink, RandomSource, SessionStore, systemClock } from "./interfaces/collaborators";
import { RestoreError } from "./errors";
import { resolveDifficulty } from "./config";
import log, { Logger } from "./logger";

export interface GameStateMachineOptions {
  puzzle: PuzzleDefinition;
  /** Overrides merged over DEFAULT_DIFFICULTY */
  difficulty?: Partial<DifficultyConfig>;
  random?: RandomSource;
  clock?: Clock;
  progressSink?: ProgressSink;
  sessionStore?: SessionStore;
  logger?: Logger;
}

/** Which cell a hint reveals. "selected" falls back to random. */
export type HintTarget = "random" | "selected" | { index: number };

export type GameListener = (entry: TranscriptEntry) => void;

export interface WordGroup {
  indices: number[];
  /** The group is followed by a space cell */
  includesSpace: boolean;
}

interface LiveState {
  cells: Cell[];
  tracker: SessionTracker;
  transcript: TranscriptBuilder;
}

/**
 * Owns the live cells and session of one puzzle and applies player
 * interactions to them. Every operation is synchronous. Ineligible targets
 * are ignored rather than thrown: they are races between the UI and fast
 * changing state, not programmer errors.
 */
export class GameStateMachine implements CellBoard {
  private puzzle: PuzzleDefinition;
  private readonly difficulty: DifficultyConfig;
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private readonly progressSink?: ProgressSink;
  private readonly sessionStore?: SessionStore;
  private readonly baseLog: Logger;
  private log: Logger;
  private readonly navigator: CellNavigator;
  private readonly listeners = new Set<GameListener>();

  private liveCells: Cell[];
  private tracker: SessionTracker;
  private transcript: TranscriptBuilder;

  constructor(opts: GameStateMachineOptions) {
    this.puzzle = opts.puzzle;
    this.difficulty = resolveDifficulty(opts.difficulty);
    this.random = opts.random ?? mathRandomSource;
    this.clock = opts.clock ?? systemClock;
    this.progressSink = opts.progressSink;
    this.sessionStore = opts.sessionStore;
    this.baseLog = opts.logger ?? log;
    this.log = this.baseLog.child({ puzzleId: opts.puzzle.puzzleId });
    this.navigator = new CellNavigator(this);

    const state = this.begin(opts.puzzle);
    this.liveCells = state.cells;
    this.tracker = state.tracker;
    this.transcript = state.transcript;
    this.checkCompletion();
  }

  // ---------------------------------------------------------------------------
  // Read-only accessors
  // ---------------------------------------------------------------------------

  get cells(): readonly Readonly<Cell>[] {
    return this.liveCells;
  }

  get session(): Readonly<PuzzleSession> {
    return this.tracker.data;
  }

  get puzzleId(): string {
    return this.puzzle.puzzleId;
  }

  get difficultyConfig(): Readonly<DifficultyConfig> {
    return this.difficulty;
  }

  get isComplete(): boolean {
    return this.tracker.data.isComplete;
  }

  get isFailed(): boolean {
    return this.tracker.data.isFailed;
  }

  get phase(): GamePhase {
    if (this.isComplete) return "completed";
    if (this.isFailed) return "failed";
    return this.tracker.hasStarted ? "active" : "idle";
  }

  get selectedCellIndex(): number | null {
    return this.tracker.data.selectedCellIndex;
  }

  /** Milliseconds played, pauses excluded */
  get elapsedTime(): number {
    return this.tracker.elapsedTime();
  }

  /** Fraction of letter cells holding any input, pre-fills included */
  get progress(): number {
    const letters = this.liveCells.filter((c) => !c.isSymbol);
    if (letters.length === 0) return 0;
    return letters.filter((c) => !isCellEmpty(c)).length / letters.length;
  }

  /** Letter cells the player still has to solve themselves */
  get remainingCellCount(): number {
    return this.liveCells.filter((c) => !c.isSymbol && !c.isPreFilled && !isCellCorrect(c)).length;
  }

  /** Encoded tokens whose every occurrence holds input */
  get completedTokens(): string[] {
    const byToken = new Map<string, boolean>();
    for (const cell of this.liveCells) {
      if (cell.isSymbol) continue;
      byToken.set(cell.encodedToken, (byToken.get(cell.encodedToken) ?? true) && !isCellEmpty(cell));
    }
    return [...byToken].filter(([, filled]) => filled).map(([token]) => token).sort();
  }

  /** Cell indices grouped into words, split on space cells */
  get wordGroups(): WordGroup[] {
    const groups: WordGroup[] = [];
    let current: number[] = [];

    this.liveCells.forEach((cell, index) => {
      if (cell.isSymbol && isWhitespace(cell.encodedToken)) {
        if (current.length > 0) groups.push({ indices: current, includesSpace: true });
        current = [];
      } else {
        current.push(index);
      }
    });

    if (current.length > 0) groups.push({ indices: current, includesSpace: false });
    return groups;
  }

  snapshot(): GameSnapshot {
    return {
      puzzleId: this.puzzle.puzzleId,
      scheme: this.puzzle.scheme,
      cells: cloneCells(this.liveCells),
      session: this.tracker.snapshot(),
    };
  }

  getTranscript(): SessionTranscript {
    return this.transcript.getTranscript();
  }

  /** Listen to every applied event. Returns an unsubscribe function. */
  subscribe(listener: GameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  selectCell(index: number): boolean {
    const cell = this.cellAt(index);
    if (!cell || cell.isSymbol) return false;
    if (this.tracker.data.selectedCellIndex === index) return false;

    this.tracker.select(index);
    this.record({ type: "select", index });
    return true;
  }

  /** Manual left/right navigation; with nothing selected, selects the first cell. */
  moveSelection(direction: Direction): boolean {
    const target = this.navigator.adjacentIndex(this.tracker.data.selectedCellIndex, direction);
    return target !== null && this.selectCell(target);
  }

  inputLetter(index: number, char: string): boolean {
    if (this.tracker.isTerminal) return false;
    const cell = this.cellAt(index);
    if (!cell || !isCellEditable(cell)) return false;
    const value = normalizeInput(char);
    if (value === null) return false;

    this.tracker.start();
    const correct = value === cell.solutionChar;
    cell.userInput = value;
    cell.isError = !correct;

    if (!correct) {
      this.tracker.select(index);
      const mistakes = this.tracker.addMistake();
      this.record({ type: "input", index, value, correct });
      if (mistakes >= this.difficulty.maxMistakes && !this.tracker.data.hasContinuedAfterFailure) {
        this.fail();
      }
      return true;
    }

    this.advanceFrom(index);
    this.record({ type: "input", index, value, correct });
    this.checkCompletion();
    return true;
  }

  /** Clears the given cell, or the selected one. Mistakes are unaffected. */
  handleDelete(index?: number): boolean {
    if (this.tracker.isTerminal) return false;
    const target = index ?? this.tracker.data.selectedCellIndex;
    if (target === null) return false;
    const cell = this.cellAt(target);
    if (!cell || !isCellEditable(cell)) return false;
    if (isCellEmpty(cell) && !cell.isError) return false;

    cell.userInput = "";
    cell.isError = false;
    this.record({ type: "delete", index: target });
    return true;
  }

  /**
   * Reveal one unsolved letter cell. Each occurrence of a token is revealed
   * on its own. Returns the revealed index, or null when nothing is eligible.
   */
  revealHint(target: HintTarget = "random"): number | null {
    if (this.tracker.isTerminal) return null;
    const index = this.resolveHintTarget(target);
    if (index === null) return null;

    const cell = this.liveCells[index];
    if (cell.solutionChar === null) return null;

    this.tracker.start();
    cell.userInput = cell.solutionChar;
    cell.isRevealed = true;
    cell.isError = false;
    this.tracker.addHint();
    this.advanceFrom(index);
    this.record({ type: "hint", index });
    this.checkCompletion();
    return index;
  }

  /** Complete iff every letter cell holds its solution letter. */
  checkCompletion(): boolean {
    if (this.tracker.data.isComplete) return true;
    if (this.tracker.data.isFailed) return false;

    const letters = this.liveCells.filter((c) => !c.isSymbol);
    if (letters.length === 0 || !letters.every(isCellCorrect)) return false;

    this.tracker.markComplete();
    this.record({ type: "complete" });
    this.log.info(
      { elapsedTime: this.tracker.elapsedTime(), mistakes: this.session.mistakeCount, hints: this.session.hintCount },
      "Puzzle completed"
    );
    this.emitTerminal();
    return true;
  }

  togglePause(): boolean {
    if (!this.tracker.togglePause()) return false;
    this.record({ type: this.tracker.data.isPaused ? "pause" : "resume" });
    return true;
  }

  /** Keep playing after a failure; further mistakes no longer fail. */
  clearFailureState(): boolean {
    if (!this.tracker.clearFailureState()) return false;
    this.record({ type: "continue" });
    this.log.info({ mistakes: this.session.mistakeCount }, "Continuing after failure");
    return true;
  }

  /** Start over on the given puzzle (or the current one) with a fresh session. */
  reset(puzzle: PuzzleDefinition = this.puzzle): void {
    const state = this.begin(puzzle);
    this.puzzle = puzzle;
    this.log = this.baseLog.child({ puzzleId: puzzle.puzzleId });
    this.liveCells = state.cells;
    this.tracker = state.tracker;
    this.transcript = state.transcript;
    this.checkCompletion();
  }

  /**
   * Replace live state with persisted cells and session without re-running
   * alignment. The cells must belong to the loaded puzzle. A board saved
   * fully solved but not yet marked complete completes here.
   */
  restore(cells: readonly Cell[], session: PuzzleSession): void {
    if (cells.length !== this.liveCells.length) {
      throw new RestoreError(
        "CELL_COUNT_MISMATCH",
        `Expected ${this.liveCells.length} cells for puzzle ${this.puzzle.puzzleId}, got ${cells.length}`
      );
    }
    cells.forEach((cell, i) => {
      if (cell.id !== this.liveCells[i].id) {
        throw new RestoreError("PUZZLE_MISMATCH", `Cell ${i} does not belong to puzzle ${this.puzzle.puzzleId}`);
      }
    });
    if (session.isComplete && session.isFailed) {
      throw new RestoreError("INVALID_SESSION", "A session cannot be both complete and failed");
    }

    const restored = cloneCells(cells).map((cell, position) =>
      cell.isSymbol
        ? { ...cell, position, solutionChar: null, userInput: "", isRevealed: false, isPreFilled: false, isError: false }
        : { ...cell, position, userInput: cell.userInput.toUpperCase() }
    );
    const selected = session.selectedCellIndex;
    const validSelection = selected !== null && restored[selected] !== undefined && !restored[selected].isSymbol;

    this.liveCells = restored;
    this.tracker = new SessionTracker(this.clock, { ...session, selectedCellIndex: validSelection ? selected : null });
    this.transcript = new TranscriptBuilder(this.puzzle.puzzleId, this.hashableState());
    this.log.info({ mistakes: session.mistakeCount, hints: session.hintCount }, "Session restored");
    this.checkCompletion();
  }

  restoreSnapshot(snapshot: GameSnapshot): void {
    if (snapshot.puzzleId !== this.puzzle.puzzleId) {
      throw new RestoreError(
        "PUZZLE_MISMATCH",
        `Snapshot for ${snapshot.puzzleId} cannot restore puzzle ${this.puzzle.puzzleId}`
      );
    }
    this.restore(snapshot.cells, snapshot.session);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private begin(puzzle: PuzzleDefinition): LiveState {
    const cells = alignPuzzle(puzzle);
    const prefilled = applyPrefill(cells, this.difficulty, this.random);
    const tracker = new SessionTracker(this.clock);
    const transcript = new TranscriptBuilder(puzzle.puzzleId, { cells, session: tracker.data });

    this.baseLog.info(
      {
        puzzleId: puzzle.puzzleId,
        scheme: puzzle.scheme,
        mode: this.difficulty.mode,
        cells: cells.length,
        prefilled: prefilled.length,
      },
      "Puzzle loaded"
    );
    return { cells, tracker, transcript };
  }

  private cellAt(index: number): Cell | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.liveCells.length) return undefined;
    return this.liveCells[index];
  }

  private isHintEligible(cell: Cell): boolean {
    return isCellEditable(cell) && !isCellCorrect(cell);
  }

  private resolveHintTarget(target: HintTarget): number | null {
    if (typeof target === "object") {
      const cell = this.cellAt(target.index);
      return cell && this.isHintEligible(cell) ? target.index : null;
    }

    if (target === "selected") {
      const selected = this.tracker.data.selectedCellIndex;
      const cell = selected === null ? undefined : this.cellAt(selected);
      if (selected !== null && cell && this.isHintEligible(cell)) return selected;
    }

    const eligible = this.liveCells.filter((c) => this.isHintEligible(c)).map((c) => c.position);
    return pickRandom(eligible, this.random) ?? null;
  }

  private advanceFrom(index: number): void {
    this.tracker.select(this.navigator.nextEligibleIndex(index, 1) ?? index);
  }

  private fail(): void {
    this.tracker.markFailed();
    this.record({ type: "fail" });
    this.log.info({ mistakes: this.session.mistakeCount, maxMistakes: this.difficulty.maxMistakes }, "Puzzle failed");
    this.emitTerminal();
  }

  private hashableState(): { cells: Cell[]; session: PuzzleSession } {
    return { cells: this.liveCells, session: this.tracker.data };
  }

  private record(event: GameEvent): void {
    const entry = this.transcript.addEntry(event, this.hashableState(), this.clock.now());
    this.log.debug({ event, sequence: entry.sequence }, "Game event");
    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (err) {
        this.log.error({ err, sequence: entry.sequence }, "Game listener threw");
      }
    }
  }

  /** Immediate save plus one progress record per terminal transition. */
  private emitTerminal(): void {
    const session = this.tracker.data;
    const terminal: TerminalSnapshot = {
      puzzleId: this.puzzle.puzzleId,
      scheme: this.puzzle.scheme,
      mode: this.difficulty.mode,
      isComplete: session.isComplete,
      mistakeCount: session.mistakeCount,
      hintCount: session.hintCount,
      elapsedTime: this.tracker.elapsedTime(),
      finishedAt: session.endTime ?? this.clock.now(),
    };

    const { sessionStore, progressSink } = this;
    if (sessionStore) {
      const snapshot = this.snapshot();
      this.deliver("sessionStore", () => sessionStore.save(snapshot));
    }
    if (progressSink) {
      this.deliver("progressSink", () => progressSink.record(terminal));
    }
  }

  /** Fire-and-forget: delivery is never retried, failures are only logged. */
  private deliver(collaborator: string, send: () => void | Promise<void>): void {
    try {
      void Promise.resolve(send()).catch((err: unknown) => {
        this.log.error({ err, collaborator }, "Terminal delivery failed");
      });
    } catch (err) {
      this.log.error({ err, collaborator }, "Terminal delivery failed");
    }
  }
}

/** One uppercase letter, or null when the input is anything else. */
export function normalizeInput(char: string): string | null {
  const chars = Array.from(char.trim().toUpperCase());
  if (chars.length !== 1 || !isLetter(chars[0])) return null;
  return chars[0];
}
