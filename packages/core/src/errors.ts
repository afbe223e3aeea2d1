import type { MoveRecord } from "./types/game";

/** A move that is out of bounds, malformed, or unreachable. The engine replaces it with a random walk. */
export class InvalidMoveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidMoveError";
  }
}

/** Raised by a human-operated agent to stop the whole game. Never recovered. */
export class GameAbortError extends Error {
  constructor(message = "Game aborted by player") {
    super(message);
    this.name = "GameAbortError";
  }
}

/** The board reached a state normal play cannot produce */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

/** What the engine made of one agent call */
export type MoveOutcome =
  | { kind: "valid"; move: MoveRecord }
  | { kind: "invalid"; reason: string; error?: unknown }
  | { kind: "abort"; error: GameAbortError };
