import { InvariantViolationError } from "@/lib/errors";
import type { Cell, Coord, Move } from "@/types/puzzle";
import {
  CELL_COUNT,
  EMPTY,
  MAX_TILE,
  findEmpty,
  inBounds,
  solvedCells,
  tilesToGrid,
  toIndex,
} from "./systems/GridSystem";
import { pullSource } from "./systems/MoveSystem";

/**
 * A 4x4 sliding-puzzle board addressed by (col, row).
 *
 * Equality is by content. `set` and `swap` do not re-validate; only
 * `applyMove` is guaranteed to keep a valid board valid.
 */
export class Board {
  private readonly cells: Cell[];

  /** Defaults to the solved board: 1..15 row-major, empty bottom-right. */
  constructor(cells: readonly Cell[] = solvedCells()) {
    if (cells.length !== CELL_COUNT) {
      throw new InvariantViolationError(
        `A board needs ${CELL_COUNT} cells, got ${cells.length}`,
        { length: cells.length }
      );
    }
    this.cells = [...cells];
  }

  /** Builds a board from row-major cells, or null when they do not form a valid board. */
  static fromCells(cells: readonly Cell[]): Board | null {
    if (cells.length !== CELL_COUNT) return null;
    const board = new Board(cells);
    return board.isValid() ? board : null;
  }

  get(col: number, row: number): Cell {
    return this.cells[this.indexOf(col, row)];
  }

  set(col: number, row: number, value: Cell) {
    this.cells[this.indexOf(col, row)] = value;
  }

  swap(col1: number, row1: number, col2: number, row2: number) {
    const a = this.indexOf(col1, row1);
    const b = this.indexOf(col2, row2);
    const tmp = this.cells[a];
    this.cells[a] = this.cells[b];
    this.cells[b] = tmp;
  }

  locateEmpty(): Coord {
    const empty = findEmpty(this.cells);
    if (!empty) {
      throw new InvariantViolationError("Invalid board: there is no empty cell", {
        cells: this.key(),
      });
    }
    return empty;
  }

  /** Slides one tile into the empty cell. Returns false, leaving the board as is, when the move is illegal here. */
  applyMove(move: Move): boolean {
    const empty = this.locateEmpty();
    const source = pullSource(empty, move);
    if (!source) return false;
    this.swap(empty.col, empty.row, source.col, source.row);
    return true;
  }

  /**
   * Applies the moves in order and returns how many succeeded. Illegal moves
   * are skipped and the remaining ones are still tried.
   */
  applyMoves(moves: readonly Move[]): number {
    let applied = 0;
    for (const move of moves) {
      if (this.applyMove(move)) applied += 1;
    }
    return applied;
  }

  equals(other: Board): boolean {
    return this.cells.every((cell, index) => cell === other.cells[index]);
  }

  /**
   * One pass with a seen-tracker: slot 0 is the empty cell, 1..15 the tiles.
   * Fails on the first out-of-range tile or repeated slot.
   */
  isValid(): boolean {
    const seen = new Array<boolean>(CELL_COUNT).fill(false);
    for (const cell of this.cells) {
      let slot = 0;
      if (cell !== EMPTY) {
        if (!Number.isInteger(cell) || cell < 1 || cell > MAX_TILE) return false;
        slot = cell;
      }
      if (seen[slot]) return false;
      seen[slot] = true;
    }
    return true;
  }

  clone(): Board {
    return new Board(this.cells);
  }

  key(): string {
    return this.cells.join(",");
  }

  toRows(): Cell[][] {
    return tilesToGrid(this.cells);
  }

  private indexOf(col: number, row: number) {
    if (!inBounds({ col, row })) {
      throw new InvariantViolationError(`Cell (${col}, ${row}) is outside the board`, {
        col,
        row,
      });
    }
    return toIndex({ col, row });
  }
}
