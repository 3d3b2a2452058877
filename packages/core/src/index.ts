export * from "./types/cell";
export * from "./types/session";
export * from "./types/puzzle";
export * from "./types/transcript";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export { TranscriptBuilder, verifyTranscript } from "./libs/TranscriptBuilder";
export { formatMinutesSeconds, formatShortMinutesSeconds } from "./libs/formatDuration";
