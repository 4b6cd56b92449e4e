import { GameState, IRulesOracle } from "./interfaces/IRulesOracle";

/**
 * Turn prompt for the side to move. Depends only on the oracle's metadata
 * and the given state, so the same state always yields the same text.
 */
export function buildTurnPrompt<S extends GameState>(
  oracle: IRulesOracle<S>,
  state: S
): string {
  const side = oracle.sideLabels[oracle.sideToMove(state)];
  return [
    `You are a ${oracle.name.toLowerCase()} master playing a game as ${side}.`,
    `Rules of this exchange: you answer with exactly one legal move in ${oracle.moveNotation} notation (e.g. ${oracle.moveExample}).`,
    "A reply that is not a single move, or a move that is not legal in this position, loses the game immediately.",
    `Here is the current board in ${oracle.positionNotation}: ${state.position}`,
    `Please provide your next move in ${oracle.moveNotation} format. Just give the move only, no explanation.`,
  ].join("\n");
}
