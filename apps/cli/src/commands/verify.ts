import { readFile, writeFile } from "node:fs/promises";
import { Command } from "commander";
import { MatchTranscript, isMatchTranscript } from "@llmduel/core";
import { ReplayResult, replayTranscript } from "@llmduel/game-chess";

const TRANSCRIPT_FILE_VERSION = 1;

interface TranscriptFile {
  version: number;
  games: MatchTranscript[];
}

export async function writeTranscriptFile(
  path: string,
  games: MatchTranscript[]
): Promise<void> {
  const file: TranscriptFile = { version: TRANSCRIPT_FILE_VERSION, games };
  await writeFile(path, JSON.stringify(file, null, 2) + "\n", "utf-8");
}

export async function readTranscriptFile(path: string): Promise<MatchTranscript[]> {
  const parsed: unknown = JSON.parse(await readFile(path, "utf-8"));
  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("version" in parsed) ||
    parsed.version !== TRANSCRIPT_FILE_VERSION ||
    !("games" in parsed) ||
    !Array.isArray(parsed.games)
  ) {
    throw new Error(`${path} is not a version ${TRANSCRIPT_FILE_VERSION} transcript file`);
  }

  const games: MatchTranscript[] = [];
  for (const [i, game] of parsed.games.entries()) {
    if (!isMatchTranscript(game)) {
      throw new Error(`${path}: game ${i + 1} is not a transcript`);
    }
    games.push(game);
  }
  return games;
}

/** Replay every game in a transcript file. */
export async function verifyTranscriptFile(path: string): Promise<ReplayResult[]> {
  const games = await readTranscriptFile(path);
  return games.map((game) => replayTranscript(game));
}

export function describeReplay(game: number, result: ReplayResult): string {
  if (result.ok) {
    return `Game ${game}: ok, ${result.finalState.ply} moves, root ${result.rootHash}`;
  }
  return `Game ${game}: broken at entry ${result.index}: ${result.reason}`;
}

export function registerVerifyCommand(program: Command): void {
  program
    .command("verify <file>")
    .description("Check a transcript file written by play --transcript")
    .action(async (file: string) => {
      const results = await verifyTranscriptFile(file);
      results.forEach((result, i) => console.log(describeReplay(i + 1, result)));
      if (results.some((result) => !result.ok)) process.exit(1);
    });
}
