import { Board } from "../Board";

const SOLVED = new Board();

export const isSolvedAgainst = (board: Board, target: Board) => board.equals(target);

export const isSolved = (board: Board) => isSolvedAgainst(board, SOLVED);
