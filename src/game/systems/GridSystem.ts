import type { Cell, Coord } from "@/types/puzzle";

export const GRID_SIZE = 4;
export const CELL_COUNT = GRID_SIZE * GRID_SIZE;
export const MAX_TILE = CELL_COUNT - 1;
export const EMPTY = -1;

export const inBounds = ({ col, row }: Coord) =>
  Number.isInteger(col) &&
  Number.isInteger(row) &&
  col >= 0 &&
  col < GRID_SIZE &&
  row >= 0 &&
  row < GRID_SIZE;

// row-major
export const toIndex = ({ col, row }: Coord) => row * GRID_SIZE + col;

export const solvedCells = (): Cell[] =>
  Array.from({ length: CELL_COUNT }, (_, index) =>
    index === CELL_COUNT - 1 ? EMPTY : index + 1
  );

export const findEmpty = (cells: readonly Cell[]): Coord | null => {
  const index = cells.indexOf(EMPTY);
  if (index < 0) return null;
  return { col: index % GRID_SIZE, row: Math.floor(index / GRID_SIZE) };
};

export const tilesToGrid = (cells: readonly Cell[]) => {
  const grid: Cell[][] = [];
  for (let row = 0; row < GRID_SIZE; row += 1) {
    const start = row * GRID_SIZE;
    grid.push(cells.slice(start, start + GRID_SIZE));
  }
  return grid;
};

export const gridToTiles = (grid: Cell[][]) => grid.flat();
