import type { Direction, Position } from "@enclosure/core";
import type { Board } from "../Board";

/**
 * The move an agent proposes. Agents are untrusted, so the engine parses
 * whatever comes back against this shape rather than relying on it.
 */
export type ProposedMove =
  | { pos: Position; dir: Direction }
  | readonly [Position, Direction];

/**
 * A move-producing collaborator. One instance plays one seat for one game
 * and may keep state between calls.
 */
export interface IAgent {
  /** Registry name (e.g. "random_agent") */
  readonly name: string;

  /** Whether the agent can play unattended */
  readonly autoplay: boolean;

  /**
   * Choose this turn's move.
   *
   * `board` is the agent's own copy; changes to it never reach the game.
   * Throwing (or returning garbage) costs the agent its turn: a random legal
   * move is played instead. The one exception is `GameAbortError`, which
   * stops the game.
   */
  step(
    board: Board,
    myPos: Position,
    advPos: Position,
    maxStep: number
  ): ProposedMove | Promise<ProposedMove>;
}

export type AgentFactory = () => IAgent;
