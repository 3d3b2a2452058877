export type GameEvent =
  | { type: "select"; index: number }
  | { type: "input"; index: number; value: string; correct: boolean }
  | { type: "delete"; index: number }
  | { type: "hint"; index: number }
  | { type: "pause" }
  | { type: "resume" }
  | { type: "complete" }
  | { type: "fail" }
  | { type: "continue" };

export interface TranscriptEntry {
  sequence: number;
  event: GameEvent;
  stateHash: string;
  prevHash: string;
  timestamp: number;
}

export interface SessionTranscript {
  puzzleId: string;
  entries: TranscriptEntry[];
  rootHash: string;
}
