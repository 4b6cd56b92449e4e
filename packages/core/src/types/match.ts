import { GameResult, Score, Seat, Side } from "./game";

/** One applied move in a hash-chained transcript. */
export interface TranscriptEntry {
  sequence: number;
  agent: string;
  seat: Seat;
  /** Move token as played, e.g. "e2e4" */
  move: string;
  /** Hash of the position the move produced */
  positionHash: string;
  /** Chain head this entry extends */
  prevHash: string;
  timestamp: number;
}

export interface MatchTranscript {
  matchId: string;
  gameId: string;
  startPosition: string;
  entries: TranscriptEntry[];
  rootHash: string;
}

export interface AgentRef {
  name: string;
  seat: Seat;
}

export interface MoveRecord {
  ply: number;
  seat: Seat;
  agent: string;
  side: Side;
  uci: string;
  san: string;
  fenBefore: string;
  fenAfter: string;
  durationMs: number;
}

/**
 * Everything a display or logging layer needs once a game is over.
 * `winner` and `loser` are null for draws.
 */
export interface GameReport {
  matchId: string;
  gameId: string;
  result: GameResult;
  score: Score;
  winner: AgentRef | null;
  loser: AgentRef | null;
  seats: Record<Seat, AgentRef>;
  plies: number;
  startPosition: string;
  finalPosition: string;
  moves: MoveRecord[];
  transcript: MatchTranscript;
}
