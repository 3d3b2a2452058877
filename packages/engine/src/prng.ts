import { RandomSource } from "./interfaces/collaborators";

/** xorshift32 seeded from a string, so pre-fill and hints replay exactly. */
export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: string) {
    let hash = 0;
    for (const ch of seed) {
      hash = (Math.imul(hash, 31) + (ch.codePointAt(0) ?? 0)) | 0;
    }
    // a zero state would stay zero forever
    this.state = hash === 0 ? 1 : hash >>> 0;
  }

  nextInt(max: number): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return Math.floor((this.state / 0x1_0000_0000) * max);
  }
}

export const mathRandomSource: RandomSource = {
  nextInt: (max) => Math.floor(Math.random() * max),
};

/** In-place Fisher-Yates; returns the same array. */
export function shuffle<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = random.nextInt(i + 1);
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  return items[random.nextInt(items.length)];
}
