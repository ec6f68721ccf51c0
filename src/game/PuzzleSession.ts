import type { LevelData, Move } from "@/types/puzzle";
import { Board } from "./Board";
import { buildLevelBoard } from "./levels/levelLoader";
import { findShortestPath, type SearchOptions } from "./systems/SearchSystem";
import { isSolved } from "./systems/WinCheckSystem";

export type SessionStatus = "idle" | "playing" | "won";

export type SessionState = {
  levelId: string | null;
  levelName: string | null;
  board: Board;
  moves: number;
  status: SessionStatus;
};

type Listener = (state: SessionState) => void;

export class PuzzleSession {
  private state: SessionState = {
    levelId: null,
    levelName: null,
    board: new Board(),
    moves: 0,
    status: "idle",
  };
  private listeners = new Set<Listener>();
  private activeLevel: LevelData | null = null;

  constructor(private readonly searchOptions: SearchOptions = {}) {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    listener(this.snapshot());
    return () => this.listeners.delete(listener);
  }

  /** Copy of the current state; its board can be changed without touching the session. */
  getState(): SessionState {
    return this.snapshot();
  }

  startLevel(level: LevelData) {
    this.activeLevel = level;
    const board = buildLevelBoard(level);
    this.setState({
      levelId: level.id,
      levelName: level.name,
      board,
      moves: 0,
      status: isSolved(board) ? "won" : "playing",
    });
  }

  resetLevel() {
    if (!this.activeLevel) return;
    this.startLevel(this.activeLevel);
  }

  /** Slides a tile; only counts and notifies when the move was legal. */
  slide(move: Move) {
    if (this.state.status !== "playing") return false;
    const board = this.state.board.clone();
    if (!board.applyMove(move)) return false;
    this.setState({
      board,
      moves: this.state.moves + 1,
      status: isSolved(board) ? "won" : "playing",
    });
    return true;
  }

  /** First move of a shortest solution, or null when already solved. */
  hint(): Move | null {
    const path = findShortestPath(this.state.board, new Board(), this.searchOptions);
    return path.length > 0 ? path[0] : null;
  }

  private snapshot(): SessionState {
    return { ...this.state, board: this.state.board.clone() };
  }

  private setState(partial: Partial<SessionState>) {
    this.state = { ...this.state, ...partial };
    this.listeners.forEach((listener) => listener(this.snapshot()));
  }
}
