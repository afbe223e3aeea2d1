import {
  Direction,
  DIRECTIONS,
  MOVES,
  Position,
  WallGrid,
  opposite,
} from "@enclosure/core";

/** Smallest board a game is played on */
export const MIN_BOARD_SIZE = 6;

/** Random board sizes are drawn from [MIN_BOARD_SIZE, MAX_BOARD_SIZE) */
export const MAX_BOARD_SIZE = 12;

/** How many edges a player may cross in one turn on an n×n board */
export function maxStepFor(boardSize: number): number {
  return Math.ceil((boardSize + 1) / 2);
}

/**
 * Square grid of cells, each holding four wall bits (up, right, down, left).
 *
 * Walls always come in mirrored pairs: a wall on the right edge of (r, c) is
 * also the left wall of (r, c + 1). The outer border is walled on
 * construction and `setWall` is the only way to add more. Walls are never
 * removed.
 */
export class Board {
  readonly size: number;
  private readonly cells: Uint8Array;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Board size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.cells = new Uint8Array(size * size);
    const last = size - 1;
    for (let i = 0; i < size; i++) {
      this.setBit(0, i, 0);
      this.setBit(i, last, 1);
      this.setBit(last, i, 2);
      this.setBit(i, 0, 3);
    }
  }

  isWall(r: number, c: number, dir: Direction): boolean {
    return (this.cells[r * this.size + c] & (1 << dir)) !== 0;
  }

  /** Wall off one edge of (r, c) and the matching edge of its neighbour */
  setWall(r: number, c: number, dir: Direction): void {
    this.setBit(r, c, dir);
    const [dr, dc] = MOVES[dir];
    const nr = r + dr;
    const nc = c + dc;
    if (this.inBounds([nr, nc])) {
      this.setBit(nr, nc, opposite(dir));
    }
  }

  inBounds(pos: Position): boolean {
    const [r, c] = pos;
    return r >= 0 && r < this.size && c >= 0 && c < this.size;
  }

  /** Independent copy; mutating it never touches this board */
  clone(): Board {
    const copy = new Board(this.size);
    copy.cells.set(this.cells);
    return copy;
  }

  /** Nested-array snapshot for renderers */
  toGrid(): WallGrid {
    return Array.from({ length: this.size }, (_, r) =>
      Array.from({ length: this.size }, (_, c) =>
        DIRECTIONS.map((dir) => this.isWall(r, c, dir))
      )
    );
  }

  /** Number of set wall bits; each interior wall counts twice, once per side */
  countWalls(): number {
    let count = 0;
    for (const cell of this.cells) {
      for (const dir of DIRECTIONS) {
        if (cell & (1 << dir)) count++;
      }
    }
    return count;
  }

  equals(other: Board): boolean {
    if (other.size !== this.size) return false;
    return this.cells.every((cell, i) => cell === other.cells[i]);
  }

  private setBit(r: number, c: number, dir: Direction): void {
    this.cells[r * this.size + c] |= 1 << dir;
  }
}
