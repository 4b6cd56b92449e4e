import { DrawRuleKind, GameReport, Seat, TurnOutcome, winningSeat } from "@llmduel/core";
import { formatMoveArrow } from "@llmduel/game-chess";

const DRAW_RULES: Record<DrawRuleKind, string> = {
  "fivefold-repetition": "fivefold repetition",
  "seventy-five-move": "the seventy-five-move rule",
  "threefold-repetition": "threefold repetition",
  "fifty-move": "the fifty-move rule",
};

export function formatLogLine(tag: string, message: string, now: Date = new Date()): string {
  const ts = now.toISOString().slice(11, 19);
  return `${ts} [${tag.padEnd(5)}] ${message}`;
}

export function log(tag: string, message: string): void {
  console.log(formatLogLine(tag, message));
}

/** One-line summary of how a game ended. */
export function describeResult(report: GameReport): string {
  const { result, seats } = report;
  switch (result.kind) {
    case "checkmate":
      return `Checkmate! ${seats[result.winner].name} wins.`;
    case "stalemate":
      return "Stalemate!";
    case "insufficient-material":
      return "Draw by insufficient material.";
    case "draw-by-rule":
      return `Draw by ${DRAW_RULES[result.rule]}.`;
    case "forfeit-illegal-move":
      return `${seats[result.loser].name} loses by rule violation!`;
    case "forfeit-malformed-proposal":
      return `${seats[result.loser].name} loses by format error!`;
  }
}

export function describeOutcome(agentName: string, outcome: TurnOutcome): string {
  switch (outcome.kind) {
    case "applied":
      return `${agentName} plays ${outcome.san} (${formatMoveArrow(outcome.move)})`;
    case "illegal-move":
      return `Illegal move by ${agentName}: ${outcome.raw}`;
    case "malformed-proposal": {
      const detail = outcome.error ? ` (${outcome.error})` : "";
      return `Invalid move format by ${agentName}: ${JSON.stringify(outcome.raw)}${detail}`;
    }
  }
}

/** Running win/loss/draw count from one agent's point of view. */
export class Tally {
  wins = 0;
  losses = 0;
  draws = 0;

  constructor(readonly agentName: string) {}

  get games(): number {
    return this.wins + this.losses + this.draws;
  }

  record(report: GameReport): void {
    const winner: Seat | null = winningSeat(report.result);
    if (winner === null) this.draws++;
    else if (report.seats[winner].name === this.agentName) this.wins++;
    else this.losses++;
  }

  toString(): string {
    return `${this.agentName}: ${this.wins}W / ${this.losses}L / ${this.draws}D (${this.games} games)`;
  }
}
