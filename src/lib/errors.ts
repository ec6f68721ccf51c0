/**
 * Structured error types for the puzzle engine.
 *
 * Malformed board text is not an error: the parser returns `null` for it.
 * Everything here signals a broken invariant or an exhausted search, and is
 * marked fatal.
 */

export enum PuzzleErrorCode {
  BOARD_INVARIANT_VIOLATED = "BOARD_INVARIANT_VIOLATED",
  SEARCH_EXHAUSTED = "SEARCH_EXHAUSTED",
  CONFIGURATION_INVALID = "CONFIGURATION_INVALID",
}

export interface PuzzleErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
}

export class PuzzleError extends Error {
  readonly code: PuzzleErrorCode;
  readonly context: Record<string, unknown>;
  readonly isFatal: boolean;

  constructor(
    code: PuzzleErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal = true
  ) {
    super(message);
    this.name = "PuzzleError";
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    Object.setPrototypeOf(this, PuzzleError.prototype);
  }

  toJSON(): PuzzleErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
    };
  }
}

/**
 * Raised when a board is addressed outside the grid or has no empty cell.
 */
export class InvariantViolationError extends PuzzleError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(PuzzleErrorCode.BOARD_INVARIANT_VIOLATED, message, context);
    this.name = "InvariantViolationError";
    Object.setPrototypeOf(this, InvariantViolationError.prototype);
  }
}

/**
 * Raised when the search runs out of levels (or states) before reaching the goal.
 */
export class SearchExhaustedError extends PuzzleError {
  constructor(maxDepth: number, context: Record<string, unknown> = {}) {
    super(
      PuzzleErrorCode.SEARCH_EXHAUSTED,
      `No path to the goal board within ${maxDepth} moves`,
      { maxDepth, ...context }
    );
    this.name = "SearchExhaustedError";
    Object.setPrototypeOf(this, SearchExhaustedError.prototype);
  }
}

export class ConfigurationError extends PuzzleError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(PuzzleErrorCode.CONFIGURATION_INVALID, message, context);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export const isPuzzleError = (value: unknown): value is PuzzleError =>
  value instanceof PuzzleError;
