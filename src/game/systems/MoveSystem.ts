import { MOVES, type Coord, type Move } from "@/types/puzzle";
import type { Board } from "../Board";
import { inBounds } from "./GridSystem";

export { MOVES };

// Offset from the empty cell to the tile each move pulls in.
const PULL_OFFSETS: Record<Move, Coord> = {
  right: { col: -1, row: 0 },
  left: { col: 1, row: 0 },
  down: { col: 0, row: -1 },
  up: { col: 0, row: 1 },
};

const INVERSES: Record<Move, Move> = {
  right: "left",
  left: "right",
  down: "up",
  up: "down",
};

/**
 * Cell whose tile slides into `empty` for this move, or null when the move
 * would pull from outside the grid.
 */
export const pullSource = (empty: Coord, move: Move): Coord | null => {
  const offset = PULL_OFFSETS[move];
  const source = { col: empty.col + offset.col, row: empty.row + offset.row };
  return inBounds(source) ? source : null;
};

export const inverseMove = (move: Move): Move => INVERSES[move];

export const invertMoves = (moves: readonly Move[]): Move[] =>
  [...moves].reverse().map(inverseMove);

export const legalMoves = (board: Board): Move[] => {
  const empty = board.locateEmpty();
  return MOVES.filter((move) => pullSource(empty, move) !== null);
};

export const isMove = (value: unknown): value is Move =>
  MOVES.some((move) => move === value);
