import {
  Direction,
  GameAbortError,
  InvalidMoveError,
  Position,
  formatPosition,
} from "@enclosure/core";
import { Board, IAgent, ProposedMove } from "@enclosure/engine";
import { Prompter, createConsolePrompter } from "./prompt";

const DIRECTION_KEYS: Record<string, Direction> = {
  u: 0,
  r: 1,
  d: 2,
  l: 3,
};

const QUIT = new Set(["q", "quit", "exit"]);

/** Parse "r,c" (or "r c") into a position */
export function parsePosition(input: string): Position | null {
  const match = /^\s*(\d+)\s*[, ]\s*(\d+)\s*$/.exec(input);
  if (!match) return null;
  return [parseInt(match[1], 10), parseInt(match[2], 10)];
}

/** Parse u/r/d/l (or the full word) into a direction */
export function parseDirection(input: string): Direction | null {
  const key = input.trim().toLowerCase().charAt(0);
  return key in DIRECTION_KEYS ? DIRECTION_KEYS[key] : null;
}

/**
 * Asks a person at the terminal for each move. Entering "q" stops the game;
 * anything unparseable forfeits the turn to a random walk.
 */
export class HumanAgent implements IAgent {
  readonly name = "human_agent";
  readonly autoplay = false;

  constructor(
    private readonly openPrompter: () => Prompter = createConsolePrompter
  ) {}

  async step(
    _board: Board,
    myPos: Position,
    _advPos: Position,
    maxStep: number
  ): Promise<ProposedMove> {
    const prompter = this.openPrompter();
    try {
      const posInput = await this.ask(
        prompter,
        `You are at ${formatPosition(myPos)}, up to ${maxStep} steps. Move to row,col (q to quit): `
      );
      const pos = parsePosition(posInput);
      if (!pos) {
        throw new InvalidMoveError(`Cannot parse position "${posInput}"`);
      }

      const dirInput = await this.ask(
        prompter,
        `Wall direction (${Object.keys(DIRECTION_KEYS).join("/")}): `
      );
      const dir = parseDirection(dirInput);
      if (dir === null) {
        throw new InvalidMoveError(`Cannot parse direction "${dirInput}"`);
      }

      return { pos, dir };
    } finally {
      prompter.close();
    }
  }

  private async ask(prompter: Prompter, question: string): Promise<string> {
    const answer = await prompter.ask(question);
    if (QUIT.has(answer.trim().toLowerCase())) {
      throw new GameAbortError("Player quit the game");
    }
    return answer;
  }
}
