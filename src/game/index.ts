export { Board } from "./Board";
export { PuzzleSession } from "./PuzzleSession";
export type { SessionState, SessionStatus } from "./PuzzleSession";
export { buildLevelBoard, getLevelById, loadLevels } from "./levels/levelLoader";
export { CELL_COUNT, EMPTY, GRID_SIZE, MAX_TILE } from "./systems/GridSystem";
export {
  MOVES,
  inverseMove,
  invertMoves,
  isMove,
  legalMoves,
} from "./systems/MoveSystem";
export {
  findShortestPath,
  findShortestPathByReplay,
} from "./systems/SearchSystem";
export type { SearchLogger, SearchOptions } from "./systems/SearchSystem";
export { parseBoard, renderBoard } from "./systems/TextFormatSystem";
export { isSolved, isSolvedAgainst } from "./systems/WinCheckSystem";
