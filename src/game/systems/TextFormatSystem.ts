import type { Cell } from "@/types/puzzle";
import { Board } from "../Board";
import { EMPTY, GRID_SIZE, gridToTiles } from "./GridSystem";

// "| 1 | 2 | 3 | 4 |" splits into GRID_SIZE slots plus an empty head and tail.
const PARTS_PER_ROW = GRID_SIZE + 2;
const UNSIGNED = /^\+?\d+$/;

const parseSlot = (slot: string): Cell | null => {
  if (slot === "") return EMPTY;
  if (!UNSIGNED.test(slot)) return null;
  return Number.parseInt(slot, 10);
};

const parseRow = (line: string): Cell[] | null => {
  const parts = line.split("|").map((part) => part.trim());
  if (parts.length !== PARTS_PER_ROW) return null;
  if (parts[0] !== "" || parts[PARTS_PER_ROW - 1] !== "") return null;

  const row: Cell[] = [];
  for (const slot of parts.slice(1, -1)) {
    const cell = parseSlot(slot);
    if (cell === null) return null;
    row.push(cell);
  }
  return row;
};

/**
 * Reads the `| XX | XX | XX | XX |` grid format. Blank lines and whitespace
 * around tokens are ignored. Returns null for malformed text and for boards
 * with duplicate or out-of-range tiles.
 */
export const parseBoard = (text: string): Board | null => {
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length !== GRID_SIZE) return null;

  const grid: Cell[][] = [];
  for (const line of lines) {
    const row = parseRow(line);
    if (!row) return null;
    grid.push(row);
  }
  return Board.fromCells(gridToTiles(grid));
};

const renderCell = (cell: Cell) =>
  cell === EMPTY ? "|    " : `| ${String(cell).padStart(2)} `;

export const renderBoard = (board: Board) =>
  board
    .toRows()
    .map((row) => `${row.map(renderCell).join("")}|\n`)
    .join("");
