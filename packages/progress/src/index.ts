export type { PuzzleAttempt, ProgressStore } from "./types";
export { MemoryProgressStore } from "./MemoryProgressStore";
export { AttemptRecorder, toAttempt } from "./AttemptRecorder";
export type { AttemptRecorderOptions } from "./AttemptRecorder";
export { StatisticsAggregator } from "./StatisticsAggregator";
export { MemorySessionStore } from "./MemorySessionStore";
export { MemoryPuzzleSource } from "./MemoryPuzzleSource";
