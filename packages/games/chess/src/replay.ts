import {
  MatchTranscript,
  TranscriptCheck,
  hashValue,
  seatForSide,
  verifyTranscript,
} from "@llmduel/core";
import { parseMoveToken } from "@llmduel/engine";
import { ChessOracle } from "./rules";
import { ChessState } from "./state";

export type ReplayResult =
  | { ok: true; rootHash: string; finalState: ChessState }
  | Extract<TranscriptCheck, { ok: false }>;

/**
 * Check a chess transcript's hash chain, then play its moves again and
 * confirm each one was legal, made by the seat on move, and reached the
 * position the entry hashed.
 */
export function replayTranscript(
  transcript: MatchTranscript,
  opts: { claimDraws?: boolean } = {}
): ReplayResult {
  const chain = verifyTranscript(transcript);
  if (!chain.ok) return chain;

  if (transcript.gameId !== "chess") {
    return { ok: false, index: 0, reason: `not a chess transcript (${transcript.gameId})` };
  }

  let oracle: ChessOracle;
  try {
    oracle = new ChessOracle({ fen: transcript.startPosition, claimDraws: opts.claimDraws });
  } catch (err) {
    return { ok: false, index: 0, reason: err instanceof Error ? err.message : String(err) };
  }

  let state = oracle.currentState();
  for (const [index, entry] of transcript.entries.entries()) {
    if (oracle.isTerminal(state)) {
      return { ok: false, index, reason: "move played after the game ended" };
    }
    const move = parseMoveToken(entry.move);
    if (!move) return { ok: false, index, reason: `unreadable move ${entry.move}` };

    const onMove = seatForSide(state.sideToMove);
    if (entry.seat !== onMove) {
      return { ok: false, index, reason: `${entry.seat} moved on ${onMove}'s turn` };
    }
    if (!oracle.isLegal(state, move)) {
      return { ok: false, index, reason: `${entry.move} is not legal in ${state.fen}` };
    }

    state = oracle.apply(state, move);
    if (hashValue(state.position) !== entry.positionHash) {
      return { ok: false, index, reason: `position after ${entry.move} does not match` };
    }
  }

  return { ok: true, rootHash: chain.rootHash, finalState: state };
}
