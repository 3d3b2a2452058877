export { GameStateMachine, normalizeInput } from "./GameStateMachine";
export type { GameStateMachineOptions, HintTarget, GameListener, WordGroup } from "./GameStateMachine";
export { alignPuzzle, tokenizeNumbers } from "./alignment";
export type { AlignmentInput, NumberToken } from "./alignment";
export { SessionTracker } from "./SessionTracker";
export { CellNavigator } from "./CellNavigator";
export type { CellBoard, Direction } from "./CellNavigator";
export { applyPrefill, prefillLetterCount } from "./prefill";
export { SeededRng, mathRandomSource, shuffle, pickRandom } from "./prng";
export { AlignmentError, RestoreError, ConfigError } from "./errors";
export type { AlignmentErrorCode, RestoreErrorCode } from "./errors";
export { systemClock } from "./interfaces/collaborators";
export type { Clock, RandomSource, PuzzleSource, ProgressSink, SessionStore } from "./interfaces/collaborators";
export { loadDifficultyFromEnv, resolveDifficulty } from "./config";
export { default as log } from "./logger";
export type { Logger } from "./logger";
