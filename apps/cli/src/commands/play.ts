import { Command } from "commander";
import { setTimeout as sleep } from "node:timers/promises";
import { GameAbortError } from "@enclosure/core";
import { World, log, resolveLevel } from "@enclosure/engine";
import { createDefaultRegistry } from "@enclosure/agents";
import { formatMove, formatResult, renderBoard } from "@enclosure/game-ui";
import { resolveConfig, setCliOverride } from "../config/index";
import { gameSettings } from "../options";

interface PlayOptions {
  player1?: string;
  player2?: string;
  boardSize?: string;
  seed?: string;
  display?: boolean;
  displayDelay?: string;
  debug?: boolean;
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play a single game between two agents")
    .option("--player1 <agent>", "Agent for player A")
    .option("--player2 <agent>", "Agent for player B")
    .option("--board-size <n>", "Board size (random when omitted)")
    .option("--seed <seed>", "Seed for a reproducible game")
    .option("--display", "Draw the board after every turn")
    .option("--display-delay <ms>", "Pause after drawing each turn")
    .option("--debug", "Label rows and columns")
    .action(async (opts: PlayOptions) => {
      if (opts.player1) setCliOverride("player1", opts.player1);
      if (opts.player2) setCliOverride("player2", opts.player2);
      if (opts.boardSize) setCliOverride("boardSize", opts.boardSize);
      if (opts.seed) setCliOverride("seed", opts.seed);
      if (opts.displayDelay) setCliOverride("displayDelay", opts.displayDelay);

      const config = await resolveConfig();
      log.level(resolveLevel(config.logLevel));
      const settings = gameSettings(config);
      const registry = createDefaultRegistry(settings.rng);

      const player0 = registry.create(settings.player1);
      const player1 = registry.create(settings.player2);
      const world = new World({
        player0,
        player1,
        boardSize: settings.boardSize,
        rng: settings.rng,
        debug: opts.debug ?? false,
      });

      // Humans need to see the board to pick a move
      const interactive = !player0.autoplay || !player1.autoplay;
      const display = opts.display === true || interactive;
      const delay = interactive ? 0 : settings.displayDelay;

      const show = async () => {
        const last = world.getLastMove();
        if (last) console.log(formatMove(last.player, last.move));
        console.log(renderBoard(world.getView()) + "\n");
        if (delay > 0) await sleep(delay);
      };

      if (display) await show();
      try {
        const result = await world.run(async () => {
          if (display) await show();
        });
        console.log(formatResult(result));
      } catch (err) {
        if (err instanceof GameAbortError) {
          console.log(`Game aborted: ${err.message}`);
          return;
        }
        throw err;
      }
    });
}
