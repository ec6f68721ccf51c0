export * from "./game";
export type { Cell, Coord, LevelData, Move } from "./types/puzzle";
export {
  ConfigurationError,
  InvariantViolationError,
  PuzzleError,
  PuzzleErrorCode,
  SearchExhaustedError,
  isPuzzleError,
} from "./lib/errors";
export type { PuzzleErrorJSON } from "./lib/errors";
export { getConfig, loadConfig, parseEnv, resetConfig } from "./lib/config";
export type { PuzzleConfig } from "./lib/config";
export { createLogger, getLogger } from "./lib/logger";
export type { LogMeta } from "./lib/logger";
