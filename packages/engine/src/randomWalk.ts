import {
  DIRECTIONS,
  InvariantViolationError,
  MoveRecord,
  Position,
  RandomSource,
  formatPosition,
  movePosition,
  pickOne,
  samePosition,
} from "@enclosure/core";
import { Board } from "./Board";

/**
 * Produce a random legal move: walk a random number of steps in [0, maxStep],
 * one random open direction at a time, then wall a random open side of the
 * cell reached.
 */
export function randomWalk(
  board: Board,
  myPos: Position,
  advPos: Position,
  maxStep: number,
  rng: RandomSource
): MoveRecord {
  const steps = rng.nextInt(maxStep + 1);
  let pos = myPos;

  for (let i = 0; i < steps; i++) {
    const allowed = DIRECTIONS.filter(
      (d) =>
        !board.isWall(pos[0], pos[1], d) &&
        !samePosition(movePosition(pos, d), advPos)
    );
    // Boxed in by walls and the opponent
    if (allowed.length === 0) break;
    pos = movePosition(pos, pickOne(rng, allowed));
  }

  const openSides = DIRECTIONS.filter((d) => !board.isWall(pos[0], pos[1], d));
  if (openSides.length === 0) {
    throw new InvariantViolationError(
      `Cell ${formatPosition(pos)} is walled on all four sides`
    );
  }

  return { pos, dir: pickOne(rng, openSides) };
}
