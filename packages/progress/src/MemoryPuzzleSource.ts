import { EncodingScheme, PuzzleDefinition } from "@cipherquote/core";
import { PuzzleSource, RandomSource, mathRandomSource, pickRandom } from "@cipherquote/engine";

export class MemoryPuzzleSource implements PuzzleSource {
  private puzzles = new Map<string, PuzzleDefinition>();

  constructor(puzzles: PuzzleDefinition[] = []) {
    for (const puzzle of puzzles) this.add(puzzle);
  }

  add(puzzle: PuzzleDefinition): void {
    this.puzzles.set(puzzle.puzzleId, puzzle);
  }

  getPuzzle(puzzleId: string): PuzzleDefinition | undefined {
    return this.puzzles.get(puzzleId);
  }

  list(scheme?: EncodingScheme): PuzzleDefinition[] {
    return [...this.puzzles.values()].filter((p) => scheme === undefined || p.scheme === scheme);
  }

  /**
   * Random puzzle for a scheme, preferring ones not in `exclude` (typically
   * the completed ids). Falls back to any puzzle once all are excluded.
   */
  randomPuzzle(
    scheme: EncodingScheme,
    exclude: ReadonlySet<string> = new Set(),
    random: RandomSource = mathRandomSource
  ): PuzzleDefinition | undefined {
    const candidates = this.list(scheme);
    const fresh = candidates.filter((p) => !exclude.has(p.puzzleId));
    return pickRandom(fresh.length > 0 ? fresh : candidates, random);
  }
}
