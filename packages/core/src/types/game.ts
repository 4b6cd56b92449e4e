/** Which of the two alternating sides is to move. */
export type Side = "first" | "second";

/**
 * Competitive role in a game. `player` always moves first,
 * `opponent` second.
 */
export type Seat = "player" | "opponent";

export const SEATS: readonly Seat[] = ["player", "opponent"];

export type PromotionPiece = "q" | "r" | "b" | "n";

/** A candidate move in coordinate notation (e.g. e7e8q). */
export interface ParsedMove {
  from: string;
  to: string;
  promotion?: PromotionPiece;
}

export type DrawRuleKind =
  | "fivefold-repetition"
  | "seventy-five-move"
  | "threefold-repetition"
  | "fifty-move";

/** Game-ending conditions reported by a rules oracle. */
export type TerminalCondition =
  | { kind: "checkmate" }
  | { kind: "stalemate" }
  | { kind: "insufficient-material" }
  | { kind: "draw-by-rule"; rule: DrawRuleKind };

export type TurnOutcome =
  | { kind: "applied"; move: ParsedMove; san: string }
  | { kind: "illegal-move"; raw: string; move: ParsedMove }
  | { kind: "malformed-proposal"; raw: string; error?: string };

export type GameResult =
  | { kind: "checkmate"; winner: Seat }
  | { kind: "stalemate" }
  | { kind: "insufficient-material" }
  | { kind: "draw-by-rule"; rule: DrawRuleKind }
  | { kind: "forfeit-illegal-move"; loser: Seat; proposal: string }
  | {
      kind: "forfeit-malformed-proposal";
      loser: Seat;
      proposal: string;
      error?: string;
    };

export type Score = "1-0" | "0-1" | "1/2-1/2";

export function otherSide(side: Side): Side {
  return side === "first" ? "second" : "first";
}

export function otherSeat(seat: Seat): Seat {
  return seat === "player" ? "opponent" : "player";
}

export function seatForSide(side: Side): Seat {
  return side === "first" ? "player" : "opponent";
}

export function sideForSeat(seat: Seat): Side {
  return seat === "player" ? "first" : "second";
}

/** Seat credited with the win, or null for draws. */
export function winningSeat(result: GameResult): Seat | null {
  switch (result.kind) {
    case "checkmate":
      return result.winner;
    case "forfeit-illegal-move":
    case "forfeit-malformed-proposal":
      return otherSeat(result.loser);
    default:
      return null;
  }
}

export function scoreFor(result: GameResult): Score {
  const winner = winningSeat(result);
  if (winner === null) return "1/2-1/2";
  return winner === "player" ? "1-0" : "0-1";
}
