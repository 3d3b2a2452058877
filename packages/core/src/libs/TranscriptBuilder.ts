import { GameEvent, TranscriptEntry, SessionTranscript } from "../types/transcript";
import { hashState, chainHash } from "./Crypto";

/**
 * Builds a hash-chained event log for one puzzle session.
 * Each entry is linked to the previous via chainHash.
 */
export class TranscriptBuilder {
  private puzzleId: string;
  private entries: TranscriptEntry[] = [];
  private currentHash: string;

  constructor(puzzleId: string, initialState: unknown) {
    this.puzzleId = puzzleId;
    this.currentHash = hashState(initialState);
  }

  addEntry(event: GameEvent, newState: unknown, timestamp: number): TranscriptEntry {
    const entry: TranscriptEntry = {
      sequence: this.entries.length,
      event,
      stateHash: hashState(newState),
      prevHash: this.currentHash,
      timestamp,
    };

    this.currentHash = chainHash(this.currentHash, entry);
    this.entries.push(entry);

    return entry;
  }

  getTranscript(): SessionTranscript {
    return {
      puzzleId: this.puzzleId,
      entries: [...this.entries],
      rootHash: this.currentHash,
    };
  }

  getCurrentHash(): string {
    return this.currentHash;
  }

  getEntryCount(): number {
    return this.entries.length;
  }
}

/**
 * Recompute the chain of a transcript and compare it with its root hash.
 * `initialHash` is the hash of the state the transcript started from.
 */
export function verifyTranscript(transcript: SessionTranscript, initialHash: string): boolean {
  let hash = initialHash;
  for (const [i, entry] of transcript.entries.entries()) {
    if (entry.sequence !== i || entry.prevHash !== hash) return false;
    hash = chainHash(hash, entry);
  }
  return hash === transcript.rootHash;
}
