import {
  Direction,
  DIRECTIONS,
  Position,
  RandomSource,
  opposite,
  pickOne,
  samePosition,
} from "@enclosure/core";
import { Board, MAX_BOARD_SIZE, MIN_BOARD_SIZE } from "./Board";
import { checkEndgame } from "./connectivity";

export function randomBoardSize(rng: RandomSource): number {
  return MIN_BOARD_SIZE + rng.nextInt(MAX_BOARD_SIZE - MIN_BOARD_SIZE);
}

/** Point reflection through the board centre */
export function mirrorPosition(size: number, pos: Position): Position {
  return [size - 1 - pos[0], size - 1 - pos[1]];
}

/**
 * Scatter `floor(size / 2) - 1` random interior walls, each paired with its
 * point-mirrored twin so the opening position is symmetric. Few enough that
 * no cell starts fully enclosed.
 */
export function seedRandomWalls(board: Board, rng: RandomSource): void {
  const n = board.size;
  const count = Math.floor(n / 2) - 1;

  for (let i = 0; i < count; i++) {
    let r: number;
    let c: number;
    let dir: Direction;
    do {
      r = rng.nextInt(n);
      c = rng.nextInt(n);
      dir = pickOne(rng, DIRECTIONS);
    } while (board.isWall(r, c, dir));

    const [ar, ac] = mirrorPosition(n, [r, c]);
    board.setWall(r, c, dir);
    board.setWall(ar, ac, opposite(dir));
  }
}

/**
 * Roll mirrored start positions until the players are on distinct cells in
 * the same partition. Walls are left as they are.
 */
export function rollStartPositions(
  board: Board,
  rng: RandomSource
): [Position, Position] {
  for (;;) {
    const p0: Position = [rng.nextInt(board.size), rng.nextInt(board.size)];
    const p1 = mirrorPosition(board.size, p0);
    if (samePosition(p0, p1)) continue;
    if (checkEndgame(board, p0, p1).ended) continue;
    return [p0, p1];
  }
}
