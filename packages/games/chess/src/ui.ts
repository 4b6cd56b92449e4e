import { ParsedMove } from "@llmduel/core";

const PIECE_SYMBOLS: Record<string, string> = {
  K: "♔",
  Q: "♕",
  R: "♖",
  B: "♗",
  N: "♘",
  P: "♙",
  k: "♚",
  q: "♛",
  r: "♜",
  b: "♝",
  n: "♞",
  p: "♟",
};

const FILES = "abcdefgh";

/** Expand the placement field of a FEN into 8 ranks of 8 cells, rank 8 first. */
function placementRows(fen: string): string[][] {
  const placement = fen.split(" ")[0] ?? "";
  return placement.split("/").map((rank) => {
    const cells: string[] = [];
    for (const ch of rank) {
      const empty = Number.parseInt(ch, 10);
      if (Number.isNaN(empty)) cells.push(ch);
      else for (let i = 0; i < empty; i++) cells.push("");
    }
    return cells;
  });
}

/**
 * Text board for the terminal. The origin square of `lastMove` is drawn as
 * "·" when it is empty.
 */
export function renderBoard(fen: string, lastMove?: ParsedMove): string {
  const rows = placementRows(fen);
  const lines: string[] = [];

  rows.forEach((cells, index) => {
    const rank = 8 - index;
    let row = `${rank} │`;
    for (let file = 0; file < 8; file++) {
      const square = `${FILES[file]}${rank}`;
      const piece = cells[file] ?? "";
      if (piece) row += ` ${PIECE_SYMBOLS[piece] ?? "?"}`;
      else if (lastMove?.from === square) row += " ·";
      else row += " .";
    }
    lines.push(row);
  });

  lines.push("  └─────────────────");
  lines.push("    a b c d e f g h");

  return lines.join("\n");
}

/** Move history form, e.g. "e2→e4" or "e7→e8=Q". */
export function formatMoveArrow(move: ParsedMove): string {
  let s = `${move.from}→${move.to}`;
  if (move.promotion) s += `=${move.promotion.toUpperCase()}`;
  return s;
}
