export { ChessOracle } from "./rules";
export type { ChessOracleOptions } from "./rules";
export {
  STARTING_FEN,
  advanceChessState,
  createChessState,
  positionKey,
  repetitionCount,
  sideFromFen,
} from "./state";
export type { ChessState } from "./state";
export { renderBoard, formatMoveArrow } from "./ui";
export { exportPgn } from "./pgn";
export type { PgnOptions } from "./pgn";
export { replayTranscript } from "./replay";
export type { ReplayResult } from "./replay";
