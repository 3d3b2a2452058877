import { GameSnapshot, cloneCells } from "@cipherquote/core";
import { SessionStore } from "@cipherquote/engine";

function copySnapshot(snapshot: GameSnapshot): GameSnapshot {
  return { ...snapshot, cells: cloneCells(snapshot.cells), session: { ...snapshot.session } };
}

/** Keeps the latest snapshot per puzzle so a session can be resumed. */
export class MemorySessionStore implements SessionStore {
  private snapshots = new Map<string, GameSnapshot>();

  save(snapshot: GameSnapshot): void {
    this.snapshots.set(snapshot.puzzleId, copySnapshot(snapshot));
  }

  load(puzzleId: string): GameSnapshot | undefined {
    const snapshot = this.snapshots.get(puzzleId);
    return snapshot ? copySnapshot(snapshot) : undefined;
  }

  delete(puzzleId: string): boolean {
    return this.snapshots.delete(puzzleId);
  }

  clear(): void {
    this.snapshots.clear();
  }
}
