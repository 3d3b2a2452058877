import dotenv from "dotenv";
import { DifficultyConfig, DifficultyMode, DEFAULT_DIFFICULTY, DIFFICULTY_MODES } from "@cipherquote/core";
import { ConfigError } from "./errors";

function parseMode(raw: string | undefined): DifficultyMode {
  if (raw === undefined || raw === "") return DEFAULT_DIFFICULTY.mode;
  const mode = DIFFICULTY_MODES.find((m) => m === raw.toLowerCase());
  if (!mode) {
    throw new ConfigError("mode", `Invalid CRYPTOGRAM_DIFFICULTY_MODE: ${raw}. Must be normal or expert.`);
  }
  return mode;
}

/**
 * Difficulty defaults from CRYPTOGRAM_* variables, for an app entry point to
 * pass into the engine. Without an explicit env, `.env` is loaded first.
 * Throws ConfigError on invalid values.
 */
export function loadDifficultyFromEnv(env?: NodeJS.ProcessEnv): DifficultyConfig {
  if (env === undefined) dotenv.config();
  const source = env ?? process.env;

  return resolveDifficulty({
    mode: parseMode(source.CRYPTOGRAM_DIFFICULTY_MODE),
    prefillFraction: parseFloat(source.CRYPTOGRAM_PREFILL_FRACTION || String(DEFAULT_DIFFICULTY.prefillFraction)),
    maxMistakes: Number(source.CRYPTOGRAM_MAX_MISTAKES || DEFAULT_DIFFICULTY.maxMistakes),
  });
}

/**
 * Merge per-puzzle overrides over a base config and validate the result.
 * Throws ConfigError when a value is out of range.
 */
export function resolveDifficulty(
  overrides: Partial<DifficultyConfig> = {},
  base: DifficultyConfig = DEFAULT_DIFFICULTY
): DifficultyConfig {
  const merged: DifficultyConfig = { ...base, ...overrides };

  if (!DIFFICULTY_MODES.includes(merged.mode)) {
    throw new ConfigError("mode", `Invalid difficulty mode: ${merged.mode}. Must be normal or expert.`);
  }
  if (!Number.isFinite(merged.prefillFraction) || merged.prefillFraction < 0 || merged.prefillFraction > 1) {
    throw new ConfigError("prefillFraction", `prefillFraction must be between 0 and 1, got ${merged.prefillFraction}`);
  }
  if (!Number.isInteger(merged.maxMistakes) || merged.maxMistakes < 1) {
    throw new ConfigError("maxMistakes", `maxMistakes must be a positive integer, got ${merged.maxMistakes}`);
  }

  return merged;
}
