export interface ConfigData {
  /** Agent playing seat A */
  player1: string;
  /** Agent playing seat B */
  player2: string;
  /** Board size; empty for a random size each game */
  boardSize: string;
  /** Seed for reproducible games; empty for Math.random */
  seed: string;
  /** Milliseconds to pause after drawing each turn */
  displayDelay: string;
  logLevel: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "player1",
  "player2",
  "boardSize",
  "seed",
  "displayDelay",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  player1: "random_agent",
  player2: "random_agent",
  boardSize: "",
  seed: "",
  displayDelay: "500",
  logLevel: "info",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  player1: "ENCLOSURE_PLAYER1",
  player2: "ENCLOSURE_PLAYER2",
  boardSize: "ENCLOSURE_BOARD_SIZE",
  seed: "ENCLOSURE_SEED",
  displayDelay: "ENCLOSURE_DISPLAY_DELAY",
  logLevel: "LOG_LEVEL",
};
