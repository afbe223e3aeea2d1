import {
  DIRECTIONS,
  MathRandom,
  MoveRecord,
  Position,
  RandomSource,
  pickOne,
} from "@enclosure/core";
import {
  Board,
  IAgent,
  checkEndgame,
  reachableCells,
} from "@enclosure/engine";

/** Outweighs any territory difference on boards up to 100x100 */
const DECISIVE = 10_000;

/**
 * One-ply search: tries every reachable cell with every free wall and keeps
 * the moves that score best.
 *
 * A move that separates the players scores by the final territory margin
 * (won games above everything, lost games below everything, ties at zero).
 * Otherwise it scores by how many more cells this agent can reach next turn
 * than the opponent.
 */
export class GreedyAgent implements IAgent {
  readonly name = "greedy_agent";
  readonly autoplay = true;

  constructor(private readonly rng: RandomSource = new MathRandom()) {}

  step(
    board: Board,
    myPos: Position,
    advPos: Position,
    maxStep: number
  ): MoveRecord {
    let best: MoveRecord[] = [];
    let bestScore = -Infinity;

    for (const cell of reachableCells(board, myPos, advPos, maxStep)) {
      for (const dir of DIRECTIONS) {
        if (board.isWall(cell[0], cell[1], dir)) continue;

        const trial = board.clone();
        trial.setWall(cell[0], cell[1], dir);
        const score = evaluate(trial, cell, advPos, maxStep);

        if (score > bestScore) {
          bestScore = score;
          best = [{ pos: cell, dir }];
        } else if (score === bestScore) {
          best.push({ pos: cell, dir });
        }
      }
    }

    return pickOne(this.rng, best);
  }
}

/** Score a position after our move, from our point of view */
export function evaluate(
  board: Board,
  myPos: Position,
  advPos: Position,
  maxStep: number
): number {
  const result = checkEndgame(board, myPos, advPos);
  if (result.ended) {
    const margin = result.scoreA - result.scoreB;
    if (margin > 0) return DECISIVE + margin;
    if (margin < 0) return -DECISIVE + margin;
    return 0;
  }
  const mine = reachableCells(board, myPos, advPos, maxStep).length;
  const theirs = reachableCells(board, advPos, myPos, maxStep).length;
  return mine - theirs;
}
