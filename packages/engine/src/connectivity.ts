import { EndgameResult, PlayerIndex, Position } from "@enclosure/core";
import { Board } from "./Board";

/**
 * Disjoint-set forest over the dense index space 0..n-1,
 * with path compression and union by rank.
 */
export class DisjointSet {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;

  constructor(n: number) {
    this.parent = new Int32Array(n);
    this.rank = new Uint8Array(n);
    for (let i = 0; i < n; i++) this.parent[i] = i;
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) root = this.parent[root];
    // Path compression
    while (this.parent[x] !== root) {
      const next = this.parent[x];
      this.parent[x] = root;
      x = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    if (this.rank[ra] < this.rank[rb]) {
      this.parent[ra] = rb;
    } else if (this.rank[ra] > this.rank[rb]) {
      this.parent[rb] = ra;
    } else {
      this.parent[rb] = ra;
      this.rank[ra]++;
    }
  }
}

/**
 * Partition the board by its walls and decide whether the two players have
 * been separated. Scores are the sizes of each player's partition; they are
 * only meaningful once `ended` is true.
 */
export function checkEndgame(
  board: Board,
  posA: Position,
  posB: Position
): EndgameResult {
  const n = board.size;
  const sets = new DisjointSet(n * n);

  // Each edge is looked at once, from its upper or left cell
  for (let r = 0; r < n; r++) {
    for (let c = 0; c < n; c++) {
      const idx = r * n + c;
      if (!board.isWall(r, c, 1)) sets.union(idx, idx + 1);
      if (!board.isWall(r, c, 2)) sets.union(idx, idx + n);
    }
  }

  const rootA = sets.find(posA[0] * n + posA[1]);
  const rootB = sets.find(posB[0] * n + posB[1]);

  let scoreA = 0;
  let scoreB = 0;
  for (let i = 0; i < n * n; i++) {
    const root = sets.find(i);
    if (root === rootA) scoreA++;
    if (root === rootB) scoreB++;
  }

  return { ended: rootA !== rootB, scoreA, scoreB };
}

/** Winner of a finished game: the player index, -1 for a tie, null while still running */
export function winnerOf(result: EndgameResult): PlayerIndex | -1 | null {
  if (!result.ended) return null;
  if (result.scoreA > result.scoreB) return 0;
  if (result.scoreB > result.scoreA) return 1;
  return -1;
}
