import {
  BoardView,
  DIRECTION_NAMES,
  EndgameResult,
  MoveRecord,
  PLAYER_NAMES,
  PlayerIndex,
  formatPosition,
  samePosition,
} from "@enclosure/core";

/**
 * Render the board as ASCII. Each cell is three characters wide; walls are
 * drawn as `---` and `|`, players as A and B. Debug mode adds row and column
 * indices.
 */
export function renderBoard(view: BoardView): string {
  const { boardSize: n, walls, p0Pos, p1Pos, debug } = view;
  const indent = debug ? "   " : "";
  const lines: string[] = [];

  if (debug) {
    const header = Array.from({ length: n }, (_, c) => `  ${c % 10} `).join("");
    lines.push((indent + header).trimEnd());
  }

  for (let r = 0; r < n; r++) {
    let edge = indent;
    let row = debug ? `${String(r).padStart(2)} ` : "";
    for (let c = 0; c < n; c++) {
      edge += walls[r][c][0] ? "+---" : "+   ";
      row += walls[r][c][3] ? "|" : " ";
      row += ` ${cellLabel([r, c], p0Pos, p1Pos)} `;
    }
    lines.push(edge + "+");
    lines.push(row + (walls[r][n - 1][1] ? "|" : " "));
  }

  let bottom = indent;
  for (let c = 0; c < n; c++) {
    bottom += walls[n - 1][c][2] ? "+---" : "+   ";
  }
  lines.push(bottom + "+");

  return lines.join("\n");
}

function cellLabel(
  cell: readonly [number, number],
  p0Pos: readonly [number, number],
  p1Pos: readonly [number, number]
): string {
  if (samePosition(cell, p0Pos)) return PLAYER_NAMES[0];
  if (samePosition(cell, p1Pos)) return PLAYER_NAMES[1];
  return " ";
}

/** e.g. "A -> (1, 2) Up" */
export function formatMove(player: PlayerIndex, move: MoveRecord): string {
  return `${PLAYER_NAMES[player]} -> ${formatPosition(move.pos)} ${DIRECTION_NAMES[move.dir]}`;
}

/** One-line score summary, e.g. "A 20 : 16 B, A wins" */
export function formatResult(result: EndgameResult): string {
  const score = `A ${result.scoreA} : ${result.scoreB} B`;
  if (!result.ended) return `${score}, in progress`;
  if (result.scoreA === result.scoreB) return `${score}, tie`;
  return `${score}, ${result.scoreA > result.scoreB ? "A" : "B"} wins`;
}
