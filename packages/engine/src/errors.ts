export type AlignmentErrorCode =
  | "EMPTY_ENCODED_TEXT"
  | "EMPTY_SOLUTION"
  | "INSUFFICIENT_SOLUTION_LETTERS"
  | "UNSUPPORTED_SCHEME";

/**
 * Malformed puzzle content. Fatal to puzzle load: a misaligned puzzle cannot
 * be recovered mid-session, so no partial cell list is ever produced.
 */
export class AlignmentError extends Error {
  readonly code: AlignmentErrorCode;
  readonly puzzleId: string;

  constructor(code: AlignmentErrorCode, puzzleId: string, message: string) {
    super(message);
    this.name = "AlignmentError";
    this.code = code;
    this.puzzleId = puzzleId;
  }
}

export type RestoreErrorCode = "CELL_COUNT_MISMATCH" | "PUZZLE_MISMATCH" | "INVALID_SESSION";

/** A persisted snapshot does not fit the live puzzle. */
export class RestoreError extends Error {
  readonly code: RestoreErrorCode;

  constructor(code: RestoreErrorCode, message: string) {
    super(message);
    this.name = "RestoreError";
    this.code = code;
  }
}

/** Invalid difficulty or environment configuration. */
export class ConfigError extends Error {
  readonly code = "INVALID_CONFIG";
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.field = field;
  }
}
