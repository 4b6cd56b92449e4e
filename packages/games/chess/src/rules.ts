import { Chess } from "chess.js";
import {
  OracleInvariantViolation,
  ParsedMove,
  Side,
  TerminalCondition,
} from "@llmduel/core";
import { IRulesOracle, formatMoveToken } from "@llmduel/engine";
import {
  ChessState,
  STARTING_FEN,
  advanceChessState,
  createChessState,
  repetitionCount,
} from "./state";

export interface ChessOracleOptions {
  /** Starting position; the standard one when omitted */
  fen?: string;
  /**
   * Also end the game on draws a player could merely claim (fifty-move
   * rule, threefold repetition). Off by default: only the automatic
   * seventy-five-move and fivefold-repetition draws apply.
   */
  claimDraws?: boolean;
}

/**
 * Chess rules oracle backed by chess.js. Every query loads the state's FEN
 * into a fresh board, so states stay immutable and queries side-effect-free.
 */
export class ChessOracle implements IRulesOracle<ChessState> {
  readonly gameId = "chess";
  readonly name = "Chess";
  readonly positionNotation = "FEN";
  readonly moveNotation = "UCI";
  readonly moveExample = "e2e4";
  readonly sideLabels: Record<Side, string> = { first: "White", second: "Black" };

  private readonly start: ChessState;
  private readonly claimDraws: boolean;

  constructor(opts: ChessOracleOptions = {}) {
    this.start = createChessState(opts.fen ?? STARTING_FEN);
    this.claimDraws = opts.claimDraws ?? false;
  }

  currentState(): ChessState {
    return this.start;
  }

  sideToMove(state: ChessState): Side {
    return state.sideToMove;
  }

  /** Exact match against the legal moves, promotion letter included. */
  isLegal(state: ChessState, move: ParsedMove): boolean {
    return this.board(state)
      .moves({ verbose: true })
      .some(
        (legal) =>
          legal.from === move.from &&
          legal.to === move.to &&
          legal.promotion === move.promotion
      );
  }

  apply(state: ChessState, move: ParsedMove): ChessState {
    const uci = formatMoveToken(move);
    if (!this.isLegal(state, move)) {
      throw new OracleInvariantViolation(`${uci} is not legal in ${state.fen}`);
    }

    const board = this.board(state);
    board.move({ from: move.from, to: move.to, promotion: move.promotion });
    return advanceChessState(state, uci, board.fen());
  }

  isTerminal(state: ChessState): boolean {
    return this.terminalReason(state) !== null;
  }

  terminalReason(state: ChessState): TerminalCondition | null {
    const board = this.board(state);

    if (board.isCheckmate()) return { kind: "checkmate" };
    if (board.isInsufficientMaterial()) return { kind: "insufficient-material" };
    if (board.isStalemate()) return { kind: "stalemate" };
    if (state.halfMoveClock >= 150) {
      return { kind: "draw-by-rule", rule: "seventy-five-move" };
    }

    const repetitions = repetitionCount(state);
    if (repetitions >= 5) {
      return { kind: "draw-by-rule", rule: "fivefold-repetition" };
    }

    if (this.claimDraws) {
      if (state.halfMoveClock >= 100) return { kind: "draw-by-rule", rule: "fifty-move" };
      if (repetitions >= 3) return { kind: "draw-by-rule", rule: "threefold-repetition" };
    }
    return null;
  }

  /** Standard algebraic notation of a legal move. */
  formatMove(state: ChessState, move: ParsedMove): string {
    const board = this.board(state);
    try {
      return board.move({ from: move.from, to: move.to, promotion: move.promotion }).san;
    } catch (err) {
      throw new OracleInvariantViolation(
        `${formatMoveToken(move)} is not legal in ${state.fen}`,
        { cause: err }
      );
    }
  }

  private board(state: ChessState): Chess {
    return new Chess(state.fen);
  }
}
