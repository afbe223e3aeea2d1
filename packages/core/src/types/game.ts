/** Wall directions, in the order each cell stores them: up, right, down, left */
export type Direction = 0 | 1 | 2 | 3;

export const DIRECTION_UP: Direction = 0;
export const DIRECTION_RIGHT: Direction = 1;
export const DIRECTION_DOWN: Direction = 2;
export const DIRECTION_LEFT: Direction = 3;

export const DIRECTIONS: readonly Direction[] = [
  DIRECTION_UP,
  DIRECTION_RIGHT,
  DIRECTION_DOWN,
  DIRECTION_LEFT,
];

export const DIRECTION_NAMES: Record<Direction, string> = {
  0: "Up",
  1: "Right",
  2: "Down",
  3: "Left",
};

/** Row/column offsets for a single step in each direction */
export const MOVES: Record<Direction, readonly [number, number]> = {
  0: [-1, 0],
  1: [0, 1],
  2: [1, 0],
  3: [0, -1],
};

const OPPOSITES: Record<Direction, Direction> = { 0: 2, 1: 3, 2: 0, 3: 1 };

export function opposite(dir: Direction): Direction {
  return OPPOSITES[dir];
}

export function isDirection(value: unknown): value is Direction {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

/** A (row, col) cell coordinate */
export type Position = readonly [number, number];

export function samePosition(a: Position, b: Position): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

export function movePosition(pos: Position, dir: Direction): Position {
  const [dr, dc] = MOVES[dir];
  return [pos[0] + dr, pos[1] + dc];
}

export function formatPosition(pos: Position): string {
  return `(${pos[0]}, ${pos[1]})`;
}

/** One turn's worth of board mutation: where the mover ends up and which edge it walls off */
export interface MoveRecord {
  pos: Position;
  dir: Direction;
}

export interface EndgameResult {
  ended: boolean;
  /** Cells in player A's partition */
  scoreA: number;
  /** Cells in player B's partition */
  scoreB: number;
}

export type PlayerIndex = 0 | 1;

export const PLAYER_NAMES: Record<PlayerIndex, string> = { 0: "A", 1: "B" };

/** `walls[row][col][dir]` is true where a wall sits on that edge */
export type WallGrid = boolean[][][];

/**
 * Read-only state handed to renderers. Nothing in it aliases engine state.
 */
export interface BoardView {
  boardSize: number;
  walls: WallGrid;
  p0Pos: Position;
  p1Pos: Position;
  turn: PlayerIndex;
  debug: boolean;
}
