import { strict as assert } from "assert";
import bunyan from "bunyan";
import { GameAbortError, InvalidMoveError, SeededRng } from "@enclosure/core";
import {
  Board,
  World,
  checkValidStep,
  maxStepFor,
  rollStartPositions,
  seedRandomWalls,
} from "@enclosure/engine";
import { RandomAgent } from "./RandomAgent";
import { GreedyAgent, evaluate } from "./GreedyAgent";
import { HumanAgent, parseDirection, parsePosition } from "./HumanAgent";
import { Prompter } from "./prompt";
import { createDefaultRegistry } from "./index";

const quiet = bunyan.createLogger({ name: "agents-test", streams: [] });

/** Prompter that replays canned answers and counts how often it was closed */
class ScriptedPrompter implements Prompter {
  closed = 0;
  questions: string[] = [];

  constructor(private readonly answers: string[]) {}

  ask(prompt: string): Promise<string> {
    this.questions.push(prompt);
    return Promise.resolve(this.answers.shift() ?? "");
  }

  close(): void {
    this.closed++;
  }
}

/**
 * 4x4 board with column 0 walled off except for the bottom row.
 * Sealing (3,1) on its left splits it 4 / 12.
 */
function nearlySealedBoard(): Board {
  const board = new Board(4);
  for (let r = 0; r < 3; r++) board.setWall(r, 0, 1);
  return board;
}

describe("RandomAgent", () => {
  it("should only produce legal moves", () => {
    const rng = new SeededRng("random-agent");
    const agent = new RandomAgent(rng);
    for (let i = 0; i < 30; i++) {
      const board = new Board(7);
      seedRandomWalls(board, rng);
      const [me, them] = rollStartPositions(board, rng);
      const move = agent.step(board, me, them, maxStepFor(7));
      assert.equal(
        checkValidStep(board, me, move.pos, move.dir, them, maxStepFor(7)),
        true
      );
    }
  });
});

describe("GreedyAgent", () => {
  it("should seal off the larger territory when it can", () => {
    const agent = new GreedyAgent(new SeededRng("greedy"));
    const move = agent.step(nearlySealedBoard(), [1, 2], [0, 0], 3);
    assert.deepEqual(move, { pos: [3, 1], dir: 3 });
  });

  it("should leave its snapshot untouched", () => {
    const board = nearlySealedBoard();
    const before = board.clone();
    new GreedyAgent(new SeededRng("greedy")).step(board, [1, 2], [0, 0], 3);
    assert.ok(board.equals(before));
  });

  it("should produce legal moves", () => {
    const rng = new SeededRng("greedy-legal");
    const agent = new GreedyAgent(rng);
    for (let i = 0; i < 10; i++) {
      const board = new Board(6);
      seedRandomWalls(board, rng);
      const [me, them] = rollStartPositions(board, rng);
      const move = agent.step(board, me, them, maxStepFor(6));
      assert.equal(
        checkValidStep(board, me, move.pos, move.dir, them, maxStepFor(6)),
        true
      );
    }
  });

  describe("evaluate", () => {
    it("should score separated positions by territory margin", () => {
      const board = nearlySealedBoard();
      board.setWall(3, 1, 3);
      assert.equal(evaluate(board, [1, 2], [0, 0], 3), 10_008);
      assert.equal(evaluate(board, [0, 0], [1, 2], 3), -10_008);
    });

    it("should score a tie as zero", () => {
      const board = new Board(4);
      for (let r = 0; r < 4; r++) board.setWall(r, 1, 1);
      assert.equal(evaluate(board, [0, 0], [0, 3], 3), 0);
    });

    it("should score open positions by reachable cells", () => {
      const board = new Board(6);
      // Corner (0,0) reaches 1+2+3 cells within 2 steps; (2,2) reaches 13
      assert.equal(evaluate(board, [0, 0], [2, 2], 2), 6 - 13);
    });
  });
});

describe("HumanAgent", () => {
  it("should read a position and a wall direction", async () => {
    const prompter = new ScriptedPrompter(["1,2", "u"]);
    const agent = new HumanAgent(() => prompter);

    const move = await agent.step(new Board(6), [0, 0], [5, 5], 4);

    assert.deepEqual(move, { pos: [1, 2], dir: 0 });
    assert.equal(prompter.questions.length, 2);
    assert.equal(prompter.closed, 1);
  });

  it("should abort the game on q", async () => {
    const prompter = new ScriptedPrompter(["q"]);
    const agent = new HumanAgent(() => prompter);

    await assert.rejects(agent.step(new Board(6), [0, 0], [5, 5], 4), GameAbortError);
    assert.equal(prompter.closed, 1);
  });

  it("should give up the turn on unreadable input", async () => {
    const agent = new HumanAgent(() => new ScriptedPrompter(["somewhere"]));
    await assert.rejects(
      agent.step(new Board(6), [0, 0], [5, 5], 4),
      (err: unknown) =>
        err instanceof InvalidMoveError &&
        err.message === 'Cannot parse position "somewhere"'
    );

    const badDir = new HumanAgent(() => new ScriptedPrompter(["1,1", "x"]));
    await assert.rejects(badDir.step(new Board(6), [0, 0], [5, 5], 4), InvalidMoveError);
  });

  it("should lose its turn to a random walk inside a game", async () => {
    const human = new HumanAgent(() => new ScriptedPrompter(["nowhere"]));
    const world = new World({
      player0: human,
      player1: new RandomAgent(new SeededRng("opponent")),
      board: new Board(6),
      positions: [
        [0, 0],
        [5, 5],
      ],
      rng: new SeededRng("fallback"),
      logger: quiet,
    });

    const result = await world.step();

    assert.equal(result.ended, false);
    assert.equal(world.getTurn(), 1);
  });

  it("should stop the game when the player quits", async () => {
    const human = new HumanAgent(() => new ScriptedPrompter(["quit"]));
    const world = new World({
      player0: human,
      player1: new RandomAgent(new SeededRng("opponent")),
      board: new Board(6),
      positions: [
        [0, 0],
        [5, 5],
      ],
      logger: quiet,
    });

    await assert.rejects(world.step(), /Player quit the game/);
  });

  describe("parsing", () => {
    it("should accept comma or space separated positions", () => {
      assert.deepEqual(parsePosition("3,4"), [3, 4]);
      assert.deepEqual(parsePosition(" 3 4 "), [3, 4]);
      assert.deepEqual(parsePosition("10, 2"), [10, 2]);
      assert.equal(parsePosition("3"), null);
      assert.equal(parsePosition("-1,2"), null);
    });

    it("should accept direction letters and words", () => {
      assert.equal(parseDirection("u"), 0);
      assert.equal(parseDirection("Right"), 1);
      assert.equal(parseDirection(" d"), 2);
      assert.equal(parseDirection("left"), 3);
      assert.equal(parseDirection("x"), null);
      assert.equal(parseDirection(""), null);
    });
  });
});

describe("createDefaultRegistry", () => {
  it("should register the built-in agents", () => {
    const registry = createDefaultRegistry(new SeededRng("registry"));
    assert.deepEqual(registry.list(), ["random_agent", "greedy_agent", "human_agent"]);
    assert.equal(registry.create("random_agent").autoplay, true);
    assert.equal(registry.create("greedy_agent").autoplay, true);
    assert.equal(registry.create("human_agent").autoplay, false);
  });

  it("should play a full unattended game", async () => {
    const rng = new SeededRng("full-game");
    const registry = createDefaultRegistry(rng);
    const world = new World({
      player0: registry.create("greedy_agent"),
      player1: registry.create("random_agent"),
      boardSize: 6,
      rng,
      autoplay: true,
      logger: quiet,
    });

    const result = await world.run();

    assert.equal(result.ended, true);
    assert.ok(result.scoreA + result.scoreB <= 36);
  });
});
