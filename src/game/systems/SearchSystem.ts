import { getConfig } from "@/lib/config";
import { SearchExhaustedError } from "@/lib/errors";
import { getLogger, type LogMeta } from "@/lib/logger";
import type { Move } from "@/types/puzzle";
import type { Board } from "../Board";
import { MOVES } from "./MoveSystem";

export type SearchLogger = {
  debug: (message: string, meta?: LogMeta) => unknown;
};

export type SearchOptions = {
  /** Most levels (moves) to explore before giving up. */
  maxDepth?: number;
  logger?: SearchLogger;
};

type Expansion<TNode> = {
  root: TNode;
  boardOf: (node: TNode) => Board;
  pathOf: (node: TNode) => Move[];
  child: (node: TNode, move: Move, board: Board) => TNode;
};

const breadthFirst = <TNode>(
  start: Board,
  goal: Board,
  options: SearchOptions,
  expansion: Expansion<TNode>
): Move[] => {
  if (start.equals(goal)) return [];

  const maxDepth = options.maxDepth ?? getConfig().search.maxDepth;
  const log: SearchLogger = options.logger ?? getLogger();
  const visited = new Set<string>([start.key()]);
  let frontier: TNode[] = [expansion.root];

  for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth += 1) {
    const next: TNode[] = [];
    for (const node of frontier) {
      const board = expansion.boardOf(node);
      for (const move of MOVES) {
        const candidate = board.clone();
        if (!candidate.applyMove(move)) continue;

        if (candidate.equals(goal)) {
          const path = [...expansion.pathOf(node), move];
          log.debug("shortest path found", { length: path.length, visited: visited.size });
          return path;
        }

        // first discovery wins: every path on this level has the same length
        const key = candidate.key();
        if (visited.has(key)) continue;
        visited.add(key);
        next.push(expansion.child(node, move, candidate));
      }
    }
    log.debug("search level expanded", {
      depth,
      frontier: next.length,
      visited: visited.size,
    });
    frontier = next;
  }

  throw new SearchExhaustedError(maxDepth, {
    visited: visited.size,
    frontier: frontier.length,
  });
};

type PathNode = { board: Board; path: Move[] };

/**
 * Breadth-first search for the fewest slides turning `start` into `goal`.
 * Moves are tried in `MOVES` order, so ties between equally short paths
 * always resolve the same way.
 *
 * Only use this when a path is known to exist: an unreachable goal explores
 * up to half of 16! boards before the level cap throws `SearchExhaustedError`.
 */
export const findShortestPath = (
  start: Board,
  goal: Board,
  options: SearchOptions = {}
): Move[] =>
  breadthFirst<PathNode>(start, goal, options, {
    root: { board: start.clone(), path: [] },
    boardOf: (node) => node.board,
    pathOf: (node) => node.path,
    child: (node, move, board) => ({ board, path: [...node.path, move] }),
  });

/**
 * Same search, but the frontier only holds move paths and each board is
 * rebuilt by replaying its path from `start`. Slower, lighter on memory per
 * frontier entry.
 */
export const findShortestPathByReplay = (
  start: Board,
  goal: Board,
  options: SearchOptions = {}
): Move[] =>
  breadthFirst<Move[]>(start, goal, options, {
    root: [],
    boardOf: (path) => {
      const board = start.clone();
      board.applyMoves(path);
      return board;
    },
    pathOf: (path) => path,
    child: (path, move) => [...path, move],
  });
