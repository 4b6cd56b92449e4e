import { DEFAULT_POSITION, validateFen } from "chess.js";
import { Side } from "@llmduel/core";
import { GameState } from "@llmduel/engine";

export const STARTING_FEN = DEFAULT_POSITION;

export interface ChessState extends GameState {
  readonly fen: string;
  /** Position the game started from */
  readonly startFen: string;
  /** Applied moves in UCI notation */
  readonly moves: readonly string[];
  /**
   * Repetition key of every position reached, starting position included.
   * The last entry is the current position.
   */
  readonly positionKeys: readonly string[];
  readonly halfMoveClock: number;
  readonly fullMoveNumber: number;
}

/**
 * Board layout, side to move, castling rights and en passant square: the
 * FEN fields that make two positions the same for repetition purposes.
 */
export function positionKey(fen: string): string {
  return fen.split(" ").slice(0, 4).join(" ");
}

export function sideFromFen(fen: string): Side {
  return fen.split(" ")[1] === "b" ? "second" : "first";
}

function counters(fen: string): { halfMoveClock: number; fullMoveNumber: number } {
  const fields = fen.split(" ");
  return {
    halfMoveClock: Number(fields[4] ?? "0"),
    fullMoveNumber: Number(fields[5] ?? "1"),
  };
}

export function createChessState(fen: string = STARTING_FEN): ChessState {
  const check = validateFen(fen);
  if (!check.ok) {
    throw new Error(`Invalid FEN "${fen}": ${check.error ?? "unknown error"}`);
  }

  return {
    fen,
    position: fen,
    startFen: fen,
    sideToMove: sideFromFen(fen),
    ply: 0,
    moves: [],
    positionKeys: [positionKey(fen)],
    ...counters(fen),
  };
}

/** State reached by playing `uci` from `state`, given the resulting FEN. */
export function advanceChessState(state: ChessState, uci: string, fen: string): ChessState {
  return {
    fen,
    position: fen,
    startFen: state.startFen,
    sideToMove: sideFromFen(fen),
    ply: state.ply + 1,
    moves: [...state.moves, uci],
    positionKeys: [...state.positionKeys, positionKey(fen)],
    ...counters(fen),
  };
}

/** How often the current position has occurred, itself included. */
export function repetitionCount(state: ChessState): number {
  const current = positionKey(state.fen);
  return state.positionKeys.filter((key) => key === current).length;
}
