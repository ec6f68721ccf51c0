import { describe, expect, it } from "vitest";
import { Board } from "../../Board";
import { EMPTY } from "../GridSystem";
import {
  inverseMove,
  invertMoves,
  isMove,
  legalMoves,
  pullSource,
} from "../MoveSystem";
import { renderBoard } from "../TextFormatSystem";
import { isSolved, isSolvedAgainst } from "../WinCheckSystem";

describe("MoveSystem", () => {
  it("pulls the neighbour opposite to the move direction", () => {
    const empty = { col: 1, row: 1 };
    expect(pullSource(empty, "right")).toEqual({ col: 0, row: 1 });
    expect(pullSource(empty, "left")).toEqual({ col: 2, row: 1 });
    expect(pullSource(empty, "down")).toEqual({ col: 1, row: 0 });
    expect(pullSource(empty, "up")).toEqual({ col: 1, row: 2 });
  });

  it("refuses to pull from outside the grid", () => {
    expect(pullSource({ col: 0, row: 2 }, "right")).toBeNull();
    expect(pullSource({ col: 3, row: 2 }, "left")).toBeNull();
    expect(pullSource({ col: 2, row: 0 }, "down")).toBeNull();
    expect(pullSource({ col: 2, row: 3 }, "up")).toBeNull();
  });

  it("applies legal moves and leaves the board alone on illegal ones", () => {
    const board = new Board();
    expect(board.applyMove("left")).toBe(false);
    expect(board.applyMove("up")).toBe(false);
    expect(board.equals(new Board())).toBe(true);

    expect(board.applyMove("down")).toBe(true);
    expect(board.isValid()).toBe(true);
    expect(board.get(3, 3)).toBe(12);
    expect(board.get(3, 2)).toBe(EMPTY);

    expect(board.applyMove("right")).toBe(true);
    expect(board.get(3, 2)).toBe(11);
    expect(board.get(2, 2)).toBe(EMPTY);
  });

  it("skips illegal moves in a sequence and keeps going", () => {
    const board = new Board();
    expect(board.applyMoves(["left", "up", "down"])).toBe(1);

    const expected = new Board();
    expected.applyMoves(["down"]);
    expect(board.equals(expected)).toBe(true);
  });

  it("counts every move of a legal sequence", () => {
    const board = new Board();
    expect(board.applyMoves(["down", "down", "down"])).toBe(3);
    expect(renderBoard(board)).toBe(
      "|  1 |  2 |  3 |    |\n" +
        "|  5 |  6 |  7 |  4 |\n" +
        "|  9 | 10 | 11 |  8 |\n" +
        "| 13 | 14 | 15 | 12 |\n"
    );
  });

  it("undoes a sequence with its inverse", () => {
    const moves = ["down", "right", "right", "up", "left", "down"] as const;
    const board = new Board();
    expect(board.applyMoves(moves)).toBe(6);
    expect(board.equals(new Board())).toBe(false);

    const undo = invertMoves(moves);
    expect(undo).toEqual(["up", "right", "down", "left", "left", "up"]);
    expect(board.applyMoves(undo)).toBe(6);
    expect(board.equals(new Board())).toBe(true);
  });

  it("pairs opposite moves", () => {
    expect(inverseMove("right")).toBe("left");
    expect(inverseMove("left")).toBe("right");
    expect(inverseMove("down")).toBe("up");
    expect(inverseMove("up")).toBe("down");
  });

  it("lists legal moves in exploration order", () => {
    const board = new Board();
    expect(legalMoves(board)).toEqual(["right", "down"]);
    board.applyMoves(["down", "right"]);
    expect(legalMoves(board)).toEqual(["right", "left", "down", "up"]);
  });

  it("recognises move labels", () => {
    expect(isMove("down")).toBe(true);
    expect(isMove("sideways")).toBe(false);
    expect(isMove(3)).toBe(false);
  });
});

describe("WinCheckSystem", () => {
  it("detects a solved board", () => {
    const board = new Board();
    expect(isSolved(board)).toBe(true);
    board.applyMove("down");
    expect(isSolved(board)).toBe(false);
    board.applyMove("up");
    expect(isSolved(board)).toBe(true);
  });

  it("compares against an arbitrary target", () => {
    const target = new Board();
    target.applyMove("right");
    const board = new Board();
    expect(isSolvedAgainst(board, target)).toBe(false);
    board.applyMove("right");
    expect(isSolvedAgainst(board, target)).toBe(true);
  });
});
