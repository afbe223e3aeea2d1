import {
  Direction,
  DIRECTIONS,
  Position,
  movePosition,
  samePosition,
} from "@enclosure/core";
import { Board } from "./Board";

/**
 * Check that a player at `start` may walk to `end` in at most `maxStep`
 * edge crossings without passing through walls or the opponent, and then
 * place a wall on side `barrierDir` of `end`.
 */
export function checkValidStep(
  board: Board,
  start: Position,
  end: Position,
  barrierDir: Direction,
  advPos: Position,
  maxStep: number
): boolean {
  // Endpoint already has that wall (including border edges)
  if (board.isWall(end[0], end[1], barrierDir)) {
    return false;
  }
  if (samePosition(start, end)) {
    return true;
  }

  const visited = new Set<number>([start[0] * board.size + start[1]]);
  let frontier: Position[] = [start];

  for (let depth = 0; depth < maxStep && frontier.length > 0; depth++) {
    const next: Position[] = [];
    for (const cur of frontier) {
      for (const dir of DIRECTIONS) {
        if (board.isWall(cur[0], cur[1], dir)) continue;
        const nextPos = movePosition(cur, dir);
        const key = nextPos[0] * board.size + nextPos[1];
        if (samePosition(nextPos, advPos) || visited.has(key)) continue;
        if (samePosition(nextPos, end)) return true;
        visited.add(key);
        next.push(nextPos);
      }
    }
    frontier = next;
  }

  return false;
}

/**
 * Every cell a player at `start` can stand on after this turn's walk,
 * including `start` itself, in BFS order.
 */
export function reachableCells(
  board: Board,
  start: Position,
  advPos: Position,
  maxStep: number
): Position[] {
  const visited = new Set<number>([start[0] * board.size + start[1]]);
  const cells: Position[] = [start];
  let frontier: Position[] = [start];

  for (let depth = 0; depth < maxStep && frontier.length > 0; depth++) {
    const next: Position[] = [];
    for (const cur of frontier) {
      for (const dir of DIRECTIONS) {
        if (board.isWall(cur[0], cur[1], dir)) continue;
        const nextPos = movePosition(cur, dir);
        const key = nextPos[0] * board.size + nextPos[1];
        if (samePosition(nextPos, advPos) || visited.has(key)) continue;
        visited.add(key);
        cells.push(nextPos);
        next.push(nextPos);
      }
    }
    frontier = next;
  }

  return cells;
}
