import { MathRandom, MoveRecord, Position, RandomSource } from "@enclosure/core";
import { Board, IAgent, randomWalk } from "@enclosure/engine";

/**
 * Plays the same random walk the engine falls back on.
 */
export class RandomAgent implements IAgent {
  readonly name = "random_agent";
  readonly autoplay = true;

  constructor(private readonly rng: RandomSource = new MathRandom()) {}

  step(
    board: Board,
    myPos: Position,
    advPos: Position,
    maxStep: number
  ): MoveRecord {
    return randomWalk(board, myPos, advPos, maxStep, this.rng);
  }
}
