import { GameSnapshot, PuzzleDefinition, TerminalSnapshot } from "@cipherquote/core";

/** Source of "now" in epoch milliseconds. Injected so tests control time. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Randomness used for pre-fill and random hint selection. */
export interface RandomSource {
  /** Return an integer in [0, max) */
  nextInt(max: number): number;
}

/**
 * Supplies encoded quotes. The engine never fetches or caches puzzles itself.
 */
export interface PuzzleSource {
  getPuzzle(puzzleId: string): PuzzleDefinition | undefined | Promise<PuzzleDefinition | undefined>;
}

/**
 * Receives one terminal snapshot per completion or failure.
 * Delivery is attempted once and never retried.
 */
export interface ProgressSink {
  record(snapshot: TerminalSnapshot): void | Promise<void>;
}

/**
 * Persistence for resumable sessions. Routine saves are the caller's to
 * debounce; the engine only requests an immediate save on terminal transitions.
 */
export interface SessionStore {
  save(snapshot: GameSnapshot): void | Promise<void>;
  load(puzzleId: string): GameSnapshot | undefined | Promise<GameSnapshot | undefined>;
}
