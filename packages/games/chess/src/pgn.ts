import { Chess } from "chess.js";
import { GameReport } from "@llmduel/core";
import { parseMoveToken } from "@llmduel/engine";

export interface PgnOptions {
  event?: string;
  site?: string;
  round?: string;
  date?: Date;
}

function pgnDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, ".");
}

function termination(report: GameReport): string {
  switch (report.result.kind) {
    case "forfeit-illegal-move":
    case "forfeit-malformed-proposal":
      return "rules infraction";
    default:
      return "normal";
  }
}

/**
 * Replay a finished game on a fresh board and export it as PGN. The player
 * seat is White, the opponent Black.
 */
export function exportPgn(report: GameReport, opts: PgnOptions = {}): string {
  const board = new Chess(report.startPosition);
  board.header(
    "Event", opts.event ?? "llmduel",
    "Site", opts.site ?? "local",
    "Date", pgnDate(opts.date ?? new Date()),
    "Round", opts.round ?? "1",
    "White", report.seats.player.name,
    "Black", report.seats.opponent.name,
    "Result", report.score,
    "Termination", termination(report)
  );

  for (const record of report.moves) {
    const move = parseMoveToken(record.uci);
    if (!move) {
      throw new Error(`Move ${record.ply} of match ${report.matchId} is not UCI: "${record.uci}"`);
    }
    board.move({ from: move.from, to: move.to, promotion: move.promotion });
  }

  return board.pgn();
}
