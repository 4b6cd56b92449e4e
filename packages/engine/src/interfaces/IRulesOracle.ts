import { ParsedMove, Side, TerminalCondition } from "@llmduel/core";

/** What the arbitration loop reads from any position. */
export interface GameState {
  readonly sideToMove: Side;
  /** Compact, serializable position descriptor (FEN for chess). */
  readonly position: string;
  /** Number of moves applied since the game started. */
  readonly ply: number;
}

// ---------------------------------------------------------------------------
// Rules Oracle: the capability set any rules engine adapter provides
// ---------------------------------------------------------------------------

/**
 * Capability set any rules engine adapter must satisfy.
 *
 * States are immutable snapshots. Every query must be side-effect-free and
 * return the same answer for the same state, however often it is called.
 */
export interface IRulesOracle<S extends GameState = GameState> {
  /** Unique identifier for the game (e.g. "chess") */
  readonly gameId: string;

  /** Human-readable name */
  readonly name: string;

  /** Name of the notation `GameState.position` is written in (e.g. "FEN") */
  readonly positionNotation: string;

  /** Name of the notation agents answer in (e.g. "UCI") */
  readonly moveNotation: string;

  /** A sample move token shown to agents (e.g. "e2e4") */
  readonly moveExample: string;

  /** Display labels per side (e.g. White / Black) */
  readonly sideLabels: Record<Side, string>;

  /** Snapshot of the position this adapter was configured with */
  currentState(): S;

  sideToMove(state: S): Side;

  isLegal(state: S, move: ParsedMove): boolean;

  /**
   * Pure transition. Only defined for moves `isLegal` accepted; adapters
   * throw OracleInvariantViolation otherwise.
   */
  apply(state: S, move: ParsedMove): S;

  isTerminal(state: S): boolean;

  /** Why the game ended, or null while it is still in progress */
  terminalReason(state: S): TerminalCondition | null;

  /** Human-readable form of a legal move in `state` (SAN for chess) */
  formatMove(state: S, move: ParsedMove): string;
}
