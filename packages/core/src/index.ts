export * from "./types/game";
export * from "./errors";
export { SeededRng, MathRandom, pickOne } from "./libs/Rng";
export type { RandomSource } from "./libs/Rng";
