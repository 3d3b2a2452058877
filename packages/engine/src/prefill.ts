import { Cell, DifficultyConfig } from "@cipherquote/core";
import { RandomSource } from "./interfaces/collaborators";
import { pickRandom, shuffle } from "./prng";

/** Number of distinct letters a normal-mode puzzle starts with. */
export function prefillLetterCount(uniqueLetterCount: number, fraction: number): number {
  if (uniqueLetterCount === 0) return 0;
  return Math.min(uniqueLetterCount, Math.max(1, Math.ceil(uniqueLetterCount * fraction)));
}

/**
 * Pre-fill one random occurrence of a random subset of the solution letters.
 * Mutates `cells` and returns the indices filled. Expert mode fills nothing.
 */
export function applyPrefill(cells: Cell[], config: DifficultyConfig, random: RandomSource): number[] {
  if (config.mode !== "normal") return [];

  const letters: string[] = [];
  for (const cell of cells) {
    if (!cell.isSymbol && cell.solutionChar !== null && !letters.includes(cell.solutionChar)) {
      letters.push(cell.solutionChar);
    }
  }

  const count = prefillLetterCount(letters.length, config.prefillFraction);
  const chosen = shuffle(letters, random).slice(0, count);
  const filled: number[] = [];

  for (const letter of chosen) {
    const occurrences = cells
      .filter((cell) => !cell.isSymbol && cell.solutionChar === letter && !cell.isRevealed && !cell.isPreFilled)
      .map((cell) => cell.position);
    const index = pickRandom(occurrences, random);
    if (index === undefined) continue;

    const cell = cells[index];
    cell.userInput = letter;
    cell.isPreFilled = true;
    cell.isError = false;
    filled.push(index);
  }

  return filled.sort((a, b) => a - b);
}
