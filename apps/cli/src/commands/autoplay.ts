import { Command } from "commander";
import { log, resolveLevel } from "@enclosure/engine";
import { createDefaultRegistry } from "@enclosure/agents";
import { resolveConfig, setCliOverride } from "../config/index";
import { gameSettings, parseIntOption } from "../options";
import { formatStats, runAutoplay } from "../simulator";

interface AutoplayCommandOptions {
  runs: string;
  player1?: string;
  player2?: string;
  boardSize?: string;
  seed?: string;
}

export function registerAutoplayCommand(program: Command): void {
  program
    .command("autoplay")
    .description("Play a batch of unattended games and report win rates")
    .option("-n, --runs <N>", "Number of games", "100")
    .option("--player1 <agent>", "First agent")
    .option("--player2 <agent>", "Second agent")
    .option("--board-size <n>", "Board size (random per game when omitted)")
    .option("--seed <seed>", "Seed for a reproducible batch")
    .action(async (opts: AutoplayCommandOptions) => {
      if (opts.player1) setCliOverride("player1", opts.player1);
      if (opts.player2) setCliOverride("player2", opts.player2);
      if (opts.boardSize) setCliOverride("boardSize", opts.boardSize);
      if (opts.seed) setCliOverride("seed", opts.seed);

      const config = await resolveConfig();
      log.level(resolveLevel(config.logLevel));
      const settings = gameSettings(config);
      const runs = parseIntOption("number of runs", opts.runs, 1) ?? 1;

      const stats = await runAutoplay({
        registry: createDefaultRegistry(settings.rng),
        player1: settings.player1,
        player2: settings.player2,
        runs,
        boardSize: settings.boardSize,
        rng: settings.rng,
      });

      console.log("");
      console.log(formatStats(stats));
      console.log("");
    });
}
