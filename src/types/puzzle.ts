export const MOVES = ["right", "left", "down", "up"] as const;

/**
 * Direction the tile next to the empty cell travels when it slides in.
 * `right` pulls the tile left of the empty cell, `up` the one below it.
 */
export type Move = (typeof MOVES)[number];

/** A tile in `1..15`, or `EMPTY` (-1). */
export type Cell = number;

export type Coord = {
  col: number;
  row: number;
};

export type LevelData = {
  id: string;
  name: string;
  moves: Move[];
};
