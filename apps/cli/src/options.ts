import { MathRandom, RandomSource, SeededRng } from "@enclosure/core";
import type { ConfigData } from "./config/index";

/** Whole number ≥ `min`, or undefined for an empty value */
export function parseIntOption(
  name: string,
  value: string,
  min: number,
): number | undefined {
  const trimmed = value.trim();
  if (trimmed === "") return undefined;
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < min) {
    throw new Error(`Invalid ${name}: "${value}". Expected a whole number of at least ${min}`);
  }
  return Number(trimmed);
}

export interface GameSettings {
  player1: string;
  player2: string;
  boardSize: number | undefined;
  displayDelay: number;
  rng: RandomSource;
}

export function gameSettings(config: ConfigData): GameSettings {
  return {
    player1: config.player1,
    player2: config.player2,
    boardSize: parseIntOption("board size", config.boardSize, 2),
    displayDelay: parseIntOption("display delay", config.displayDelay, 0) ?? 0,
    rng: config.seed ? new SeededRng(config.seed) : new MathRandom(),
  };
}
