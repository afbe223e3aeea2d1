import type Logger from "bunyan";
import { PlayerIndex, RandomSource } from "@enclosure/core";
import { AgentRegistry, World, winnerOf } from "@enclosure/engine";

export interface SeatStats {
  agent: string;
  wins: number;
  /** Slowest single turn across all games, in seconds */
  maxTurnSeconds: number;
}

export interface AutoplayStats {
  runs: number;
  ties: number;
  seats: [SeatStats, SeatStats];
}

export interface AutoplayOptions {
  registry: AgentRegistry;
  player1: string;
  player2: string;
  runs: number;
  boardSize?: number;
  rng: RandomSource;
  logger?: Logger;
  /** Called after each game with its 0-based index */
  onGame?: (index: number, stats: AutoplayStats) => void;
}

/**
 * Play `runs` unattended games. Seats swap every other game so neither
 * agent always moves first; results are reported per configured seat.
 */
export async function runAutoplay(opts: AutoplayOptions): Promise<AutoplayStats> {
  if (!Number.isInteger(opts.runs) || opts.runs < 1) {
    throw new RangeError(`Number of runs must be a positive integer, got ${opts.runs}`);
  }

  const stats: AutoplayStats = {
    runs: 0,
    ties: 0,
    seats: [
      { agent: opts.player1, wins: 0, maxTurnSeconds: 0 },
      { agent: opts.player2, wins: 0, maxTurnSeconds: 0 },
    ],
  };

  for (let i = 0; i < opts.runs; i++) {
    const swapped = i % 2 === 1;
    const seatOf = (player: PlayerIndex): PlayerIndex =>
      swapped ? (player === 0 ? 1 : 0) : player;

    const world = new World({
      player0: opts.registry.create(swapped ? opts.player2 : opts.player1),
      player1: opts.registry.create(swapped ? opts.player1 : opts.player2),
      boardSize: opts.boardSize,
      rng: opts.rng,
      autoplay: true,
      logger: opts.logger,
    });

    const result = await world.run();
    const winner = winnerOf(result);
    if (winner === 0 || winner === 1) {
      stats.seats[seatOf(winner)].wins++;
    } else {
      stats.ties++;
    }

    for (const player of [0, 1] as const) {
      const seat = stats.seats[seatOf(player)];
      seat.maxTurnSeconds = Math.max(seat.maxTurnSeconds, ...world.getTimes(player));
    }
    stats.runs++;
    opts.onGame?.(i, stats);
  }

  return stats;
}

export function formatStats(stats: AutoplayStats): string {
  const pct = (n: number) =>
    stats.runs === 0 ? "0.0" : ((n / stats.runs) * 100).toFixed(1);
  const lines = [`Played ${stats.runs} game${stats.runs === 1 ? "" : "s"}`];
  stats.seats.forEach((seat, i) => {
    lines.push(
      `  ${seat.agent} (player ${i + 1}): ${seat.wins} wins (${pct(seat.wins)}%), ` +
        `max turn ${seat.maxTurnSeconds.toFixed(3)}s`,
    );
  });
  lines.push(`  Ties: ${stats.ties} (${pct(stats.ties)}%)`);
  return lines.join("\n");
}
