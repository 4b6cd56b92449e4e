import { ParsedMove, PromotionPiece } from "@llmduel/core";

export const DEFAULT_MAX_PROPOSAL_LENGTH = 10;

const MOVE_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

/**
 * Cut a raw completion down to its candidate move token: the first
 * whitespace-delimited token of the first line. Returns null when there is
 * no token or it is longer than `maxLength`.
 */
export function extractProposalToken(
  raw: string,
  maxLength: number = DEFAULT_MAX_PROPOSAL_LENGTH
): string | null {
  const firstLine = raw.split(/\r?\n/, 1)[0] ?? "";
  const token = firstLine.trim().split(/\s+/, 1)[0] ?? "";
  if (token === "" || token.length > maxLength) return null;
  return token;
}

/**
 * Strict coordinate-notation parser: "e2e4", "e7e8q". Square letters are
 * case-insensitive. Anything else parses to null; nothing is corrected.
 */
export function parseMoveToken(token: string): ParsedMove | null {
  const match = MOVE_PATTERN.exec(token.toLowerCase());
  if (!match) return null;

  const move: ParsedMove = { from: match[1], to: match[2] };
  if (isPromotionPiece(match[3])) move.promotion = match[3];
  return move;
}

function isPromotionPiece(c: string | undefined): c is PromotionPiece {
  return c === "q" || c === "r" || c === "b" || c === "n";
}

/** Extract and parse in one go. */
export function parseProposal(
  raw: string,
  maxLength: number = DEFAULT_MAX_PROPOSAL_LENGTH
): ParsedMove | null {
  const token = extractProposalToken(raw, maxLength);
  return token === null ? null : parseMoveToken(token);
}

export function formatMoveToken(move: ParsedMove): string {
  return `${move.from}${move.to}${move.promotion ?? ""}`;
}
