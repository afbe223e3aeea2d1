import { inspect } from "node:util";
import type Logger from "bunyan";
import {
  BoardView,
  DIRECTION_NAMES,
  EndgameResult,
  GameAbortError,
  MathRandom,
  MoveOutcome,
  MoveRecord,
  PLAYER_NAMES,
  PlayerIndex,
  Position,
  RandomSource,
  formatPosition,
  isDirection,
  samePosition,
} from "@enclosure/core";
import { Board, maxStepFor } from "./Board";
import { checkEndgame, winnerOf } from "./connectivity";
import { checkValidStep } from "./reachability";
import { randomWalk } from "./randomWalk";
import { randomBoardSize, rollStartPositions, seedRandomWalls } from "./setup";
import { IAgent } from "./interfaces/IAgent";
import defaultLog from "./logger";

export interface WorldOptions {
  player0: IAgent;
  player1: IAgent;
  /** Fixed board size. Drawn at random when omitted; must match `board` when both are given. */
  boardSize?: number;
  /** Randomness for board setup and random walks. Defaults to Math.random. */
  rng?: RandomSource;
  /** Refuse agents that cannot play unattended */
  autoplay?: boolean;
  logger?: Logger;
  /** Passed through to renderers */
  debug?: boolean;
  /** Start from this board (copied) instead of a random one */
  board?: Board;
  /** Start positions for players A and B instead of random ones */
  positions?: [Position, Position];
}

/**
 * Runs a single game: asks the active agent for a move, validates it,
 * falls back to a random walk when it is unusable, applies it, and
 * re-checks whether the players have been separated.
 */
export class World {
  readonly maxStep: number;
  readonly debug: boolean;
  private readonly board: Board;
  private readonly agents: [IAgent, IAgent];
  private readonly rng: RandomSource;
  private readonly log: Logger;
  private positions: [Position, Position];
  private turn: PlayerIndex = 0;
  private turnNumber = 0;
  private times: [number[], number[]] = [[], []];
  private lastMove: { player: PlayerIndex; move: MoveRecord } | null = null;
  private resultsCache: EndgameResult;

  constructor(opts: WorldOptions) {
    this.agents = [opts.player0, opts.player1];
    this.rng = opts.rng ?? new MathRandom();
    this.log = opts.logger ?? defaultLog;
    this.debug = opts.debug ?? false;

    if (opts.autoplay) {
      for (const agent of this.agents) {
        if (!agent.autoplay) {
          throw new Error(
            `Autoplay mode is not supported by agent '${agent.name}'`
          );
        }
      }
    }

    const size = opts.board?.size ?? opts.boardSize ?? randomBoardSize(this.rng);
    if (!Number.isInteger(size) || size < 2) {
      throw new RangeError(`Board size must be an integer of at least 2, got ${size}`);
    }
    if (opts.board && opts.boardSize !== undefined && opts.boardSize !== size) {
      throw new RangeError(
        `Board size ${opts.boardSize} does not match the ${size}x${size} board given`
      );
    }

    if (opts.board) {
      this.board = opts.board.clone();
    } else {
      this.log.info({ boardSize: size }, `Setting board size to ${size}x${size}`);
      this.board = new Board(size);
      seedRandomWalls(this.board, this.rng);
    }
    this.maxStep = maxStepFor(this.board.size);

    if (opts.positions) {
      const [p0, p1] = opts.positions;
      if (!this.board.inBounds(p0) || !this.board.inBounds(p1)) {
        throw new RangeError("Start positions must lie on the board");
      }
      if (samePosition(p0, p1)) {
        throw new RangeError("Players cannot start on the same cell");
      }
      this.positions = [p0, p1];
    } else {
      this.positions = rollStartPositions(this.board, this.rng);
    }

    this.resultsCache = checkEndgame(this.board, ...this.positions);
    if (this.resultsCache.ended) {
      throw new RangeError("Players start in separate partitions");
    }
  }

  /** The active agent, its position, and the opponent's position */
  getCurrentPlayer(): [IAgent, Position, Position] {
    const me = this.turn;
    const other = me === 0 ? 1 : 0;
    return [this.agents[me], this.positions[me], this.positions[other]];
  }

  getTurn(): PlayerIndex {
    return this.turn;
  }

  getTurnNumber(): number {
    return this.turnNumber;
  }

  getBoardSize(): number {
    return this.board.size;
  }

  getPosition(player: PlayerIndex): Position {
    return this.positions[player];
  }

  /** Seconds each of `player`'s turns took */
  getTimes(player: PlayerIndex): readonly number[] {
    return this.times[player];
  }

  /** The most recent move applied, with the player who made it */
  getLastMove(): { player: PlayerIndex; move: MoveRecord } | null {
    return this.lastMove;
  }

  getResults(): EndgameResult {
    return { ...this.resultsCache };
  }

  isEnded(): boolean {
    return this.resultsCache.ended;
  }

  /** Snapshot for renderers */
  getView(): BoardView {
    return {
      boardSize: this.board.size,
      walls: this.board.toGrid(),
      p0Pos: [...this.positions[0]],
      p1Pos: [...this.positions[1]],
      turn: this.turn,
      debug: this.debug,
    };
  }

  /**
   * Play one turn and return the updated endgame status.
   * Bad moves and agent errors are absorbed; only a `GameAbortError` from the
   * agent or a broken board escapes.
   */
  async step(): Promise<EndgameResult> {
    if (this.resultsCache.ended) {
      throw new Error("Game is already over");
    }

    const player = this.turn;
    const [agent, curPos, advPos] = this.getCurrentPlayer();
    const outcome = await this.requestMove(agent, curPos, advPos);

    let move: MoveRecord;
    switch (outcome.kind) {
      case "abort":
        throw outcome.error;
      case "invalid":
        this.log.warn(
          { err: outcome.error, agent: agent.name, player: PLAYER_NAMES[player] },
          `${outcome.reason}. Executing random walk`
        );
        move = randomWalk(this.board, curPos, advPos, this.maxStep, this.rng);
        break;
      case "valid":
        move = outcome.move;
        break;
    }

    const timings = this.times[player];
    this.log.info(
      {
        player: PLAYER_NAMES[player],
        turn: this.turnNumber,
        seconds: timings[timings.length - 1],
      },
      `Player ${PLAYER_NAMES[player]} moves to ${formatPosition(move.pos)} facing ${DIRECTION_NAMES[move.dir]}`
    );

    this.positions[player] = move.pos;
    this.board.setWall(move.pos[0], move.pos[1], move.dir);
    this.lastMove = { player, move };

    this.turn = player === 0 ? 1 : 0;
    this.turnNumber++;

    this.resultsCache = checkEndgame(this.board, ...this.positions);
    if (this.resultsCache.ended) {
      this.logOutcome(this.resultsCache);
    }
    return this.getResults();
  }

  /** Step until the players are separated. `onTurn` sees every intermediate result. */
  async run(
    onTurn?: (result: EndgameResult, world: World) => void | Promise<void>
  ): Promise<EndgameResult> {
    while (!this.resultsCache.ended) {
      const result = await this.step();
      if (onTurn) await onTurn(result, this);
    }
    return this.getResults();
  }

  /**
   * Check an agent's answer against the current board.
   * `raw` is whatever the agent returned.
   */
  validateMove(raw: unknown, curPos: Position, advPos: Position): MoveOutcome {
    const proposal = parseProposal(raw);
    if (!proposal) {
      return { kind: "invalid", reason: `Malformed move ${inspect(raw, { depth: 2 })}` };
    }

    const { pos, dir } = proposal;
    if (!this.board.inBounds(pos)) {
      return {
        kind: "invalid",
        reason: `End position ${formatPosition(pos)} is out of boundary`,
      };
    }
    if (!isDirection(dir)) {
      return {
        kind: "invalid",
        reason: `Barrier dir should reside in [0, 3], but got ${String(dir)}`,
      };
    }
    if (!checkValidStep(this.board, curPos, pos, dir, advPos, this.maxStep)) {
      return {
        kind: "invalid",
        reason: `Not a valid step from ${formatPosition(curPos)} to ${formatPosition(pos)} with barrier ${DIRECTION_NAMES[dir]}, max steps = ${this.maxStep}`,
      };
    }
    return { kind: "valid", move: { pos: [pos[0], pos[1]], dir } };
  }

  private async requestMove(
    agent: IAgent,
    curPos: Position,
    advPos: Position
  ): Promise<MoveOutcome> {
    const started = performance.now();
    let raw: unknown;
    try {
      raw = await agent.step(
        this.board.clone(),
        [curPos[0], curPos[1]],
        [advPos[0], advPos[1]],
        this.maxStep
      );
    } catch (err) {
      if (err instanceof GameAbortError) {
        return { kind: "abort", error: err };
      }
      const message = err instanceof Error ? err.message : String(err);
      return { kind: "invalid", reason: `Agent raised an error: ${message}`, error: err };
    } finally {
      this.times[this.turn].push((performance.now() - started) / 1000);
    }
    return this.validateMove(raw, curPos, advPos);
  }

  private logOutcome(result: EndgameResult): void {
    const winner = winnerOf(result);
    if (winner === 0 || winner === 1) {
      const blocks = winner === 0 ? result.scoreA : result.scoreB;
      this.log.info(
        { scoreA: result.scoreA, scoreB: result.scoreB },
        `Game ends! Player ${PLAYER_NAMES[winner]} wins having control over ${blocks} blocks!`
      );
    } else {
      this.log.info(
        { scoreA: result.scoreA, scoreB: result.scoreB },
        "Game ends! It is a Tie!"
      );
    }
  }
}

function isPositionLike(value: unknown): value is Position {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    Number.isInteger(value[0]) &&
    Number.isInteger(value[1])
  );
}

/** Accept `{ pos, dir }` or `[pos, dir]`; leave range checks to the caller */
function parseProposal(raw: unknown): { pos: Position; dir: unknown } | null {
  let pos: unknown;
  let dir: unknown;
  if (Array.isArray(raw)) {
    if (raw.length !== 2) return null;
    [pos, dir] = raw;
  } else if (typeof raw === "object" && raw !== null && "pos" in raw && "dir" in raw) {
    pos = raw.pos;
    dir = raw.dir;
  } else {
    return null;
  }
  return isPositionLike(pos) ? { pos, dir } : null;
}
