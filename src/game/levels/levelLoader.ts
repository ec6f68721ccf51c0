import { z } from "zod";
import { MOVES, type LevelData } from "@/types/puzzle";
import { Board } from "../Board";
import levelsJson from "./levels.json";

export const LevelSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  moves: z.array(z.enum(MOVES)),
});

export const LevelPackSchema = z.object({
  levels: z.array(LevelSchema).min(1),
});

const levels: LevelData[] = LevelPackSchema.parse(levelsJson).levels;

export const loadLevels = () => levels;

export const getLevelById = (id: string) =>
  levels.find((level) => level.id === id) ?? levels[0];

/** The solved board scrambled by the level's moves. */
export const buildLevelBoard = (level: LevelData) => {
  const board = new Board();
  board.applyMoves(level.moves);
  return board;
};
