/**
 * Source of uniform random integers. Everything random in a game draws from
 * one of these so that a game can be replayed from its seed.
 */
export interface RandomSource {
  /** Return an integer in [0, max) */
  nextInt(max: number): number;
}

/**
 * Deterministic seeded PRNG using xorshift32.
 * Seed is derived by hashing the seed string into a 32-bit integer.
 */
export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: string) {
    this.state = SeededRng.hashString(seed);
    if (this.state === 0) this.state = 1; // xorshift cannot have state 0
  }

  private static hashString(s: string): number {
    let hash = 0;
    for (let i = 0; i < s.length; i++) {
      hash = ((hash << 5) - hash + s.charCodeAt(i)) | 0;
    }
    return hash === 0 ? 1 : Math.abs(hash);
  }

  /** Next unsigned 32-bit state */
  private next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextInt(max: number): number {
    return Math.floor((this.next() / 4294967296) * max);
  }
}

/** Unseeded source backed by Math.random */
export class MathRandom implements RandomSource {
  nextInt(max: number): number {
    return Math.floor(Math.random() * max);
  }
}

/** Pick a uniformly random element. The array must not be empty. */
export function pickOne<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError("Cannot pick from an empty list");
  }
  return items[rng.nextInt(items.length)];
}
