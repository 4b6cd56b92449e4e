import { Seat, SEATS } from "./types/game";
import { MatchTranscript, TranscriptEntry } from "./types/match";
import { hashValue, linkHash } from "./hash";

export interface TranscriptMove {
  agent: string;
  seat: Seat;
  /** Move token as played, e.g. "e2e4" */
  move: string;
  /** Position reached by the move */
  position: string;
}

export type TranscriptCheck =
  | { ok: true; rootHash: string }
  | { ok: false; index: number; reason: string };

/**
 * Tamper-evident move log. The chain starts at the hash of the start
 * position; each entry stores the head it extends and the hash of the
 * position it produced.
 */
export class TranscriptBuilder {
  private readonly entries: TranscriptEntry[] = [];
  private head: string;

  constructor(
    private readonly matchId: string,
    private readonly gameId: string,
    private readonly startPosition: string
  ) {
    this.head = hashValue(startPosition);
  }

  record(played: TranscriptMove): TranscriptEntry {
    const entry: TranscriptEntry = {
      sequence: this.entries.length,
      agent: played.agent,
      seat: played.seat,
      move: played.move,
      positionHash: hashValue(played.position),
      prevHash: this.head,
      timestamp: Date.now(),
    };
    this.head = linkHash(this.head, entry);
    this.entries.push(entry);
    return entry;
  }

  build(): MatchTranscript {
    return {
      matchId: this.matchId,
      gameId: this.gameId,
      startPosition: this.startPosition,
      entries: [...this.entries],
      rootHash: this.head,
    };
  }
}

/** Recompute the chain. Positions are not replayed; that needs the rules. */
export function verifyTranscript(transcript: MatchTranscript): TranscriptCheck {
  let head = hashValue(transcript.startPosition);
  for (const [index, entry] of transcript.entries.entries()) {
    if (entry.sequence !== index) {
      return { ok: false, index, reason: `entry ${index} carries sequence ${entry.sequence}` };
    }
    if (entry.prevHash !== head) {
      return { ok: false, index, reason: `entry ${index} does not extend the chain` };
    }
    head = linkHash(head, entry);
  }
  if (head !== transcript.rootHash) {
    return {
      ok: false,
      index: transcript.entries.length,
      reason: "root hash does not match the entries",
    };
  }
  return { ok: true, rootHash: head };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSeat(value: unknown): value is Seat {
  return SEATS.some((seat) => seat === value);
}

function isEntry(value: unknown): value is TranscriptEntry {
  return (
    isRecord(value) &&
    typeof value.sequence === "number" &&
    typeof value.agent === "string" &&
    isSeat(value.seat) &&
    typeof value.move === "string" &&
    typeof value.positionHash === "string" &&
    typeof value.prevHash === "string" &&
    typeof value.timestamp === "number"
  );
}

/** Shape check for transcripts read back from disk. */
export function isMatchTranscript(value: unknown): value is MatchTranscript {
  return (
    isRecord(value) &&
    typeof value.matchId === "string" &&
    typeof value.gameId === "string" &&
    typeof value.startPosition === "string" &&
    typeof value.rootHash === "string" &&
    Array.isArray(value.entries) &&
    value.entries.every(isEntry)
  );
}
