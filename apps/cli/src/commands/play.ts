import { writeFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { ConfigError, GameReport, Logger, createLogger } from "@llmduel/core";
import {
  AgentRegistry,
  ArbitrationHooks,
  ArbitrationLoop,
  IRulesOracle,
  parseMoveToken,
} from "@llmduel/engine";
import { OpenAiProposalSource, SerializedProposalSource } from "@llmduel/agents";
import { ChessOracle, ChessState, exportPgn, renderBoard } from "@llmduel/game-chess";
import { ArenaSettings, resolveConfig, setCliOverride, toArenaSettings } from "../config";
import { Tally, describeOutcome, describeResult, log } from "../render";
import { createPrompter } from "./prompter";
import { writeTranscriptFile } from "./verify";

export interface SeatChoice {
  player: string;
  opponent: string;
}

/** "1" gives the player seat to the first agent; any other answer to the second. */
export function chooseSeats(answer: string, names: [string, string]): SeatChoice {
  const [first, second] = names;
  return answer.trim() === "1"
    ? { player: first, opponent: second }
    : { player: second, opponent: first };
}

async function askSeats(names: [string, string]): Promise<SeatChoice> {
  const prompter = createPrompter();
  try {
    console.log("Choose your player model:");
    console.log(`1. ${names[0]}`);
    console.log(`2. ${names[1]}`);
    return chooseSeats(await prompter.ask("Enter 1 or 2: "), names);
  } finally {
    prompter.close();
  }
}

/** One resident source per configured agent, shared by every game. */
export function buildRegistry(settings: ArenaSettings): AgentRegistry {
  const registry = new AgentRegistry();
  for (const agent of settings.agents) {
    const source = new OpenAiProposalSource({
      model: agent.model,
      baseUrl: agent.baseUrl,
      apiKey: settings.apiKey,
      mode: settings.apiMode,
      id: `${agent.name}:${agent.model}`,
    });
    registry.register({ name: agent.name, source: new SerializedProposalSource(source) });
  }
  return registry;
}

function consoleHooks(): ArbitrationHooks<ChessState> {
  return {
    onTurnStart(ctx) {
      const lastMove = parseMoveToken(ctx.state.moves[ctx.state.moves.length - 1] ?? "");
      console.log("\n" + renderBoard(ctx.state.fen, lastMove ?? undefined) + "\n");
      const color = ctx.state.sideToMove === "first" ? "White" : "Black";
      log("turn", `${ctx.agent.name}'s turn (${color})`);
    },
    onProposal(ctx, raw) {
      log("move", `${ctx.agent.name} proposes: ${JSON.stringify(raw)}`);
    },
    onTurnOutcome(ctx, outcome) {
      log(outcome.kind === "applied" ? "move" : "error", describeOutcome(ctx.agent.name, outcome));
    },
  };
}

function printReport(report: GameReport): void {
  console.log("\nGame Over.");
  console.log("Final board:");
  console.log(renderBoard(report.finalPosition));
  console.log(`Result: ${report.score}`);
  console.log(describeResult(report));
}

/** Parser for --games. */
export function parseGameCount(value: string): number {
  const count = /^\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : 0;
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new InvalidArgumentError(`expected a positive whole number, got "${value}"`);
  }
  return count;
}

interface PlayOptions {
  player?: string;
  games: number;
  pgn?: string;
  transcript?: string;
  fen?: string;
  claimDraws?: boolean;
  timeout?: string;
  baseUrl?: string;
  apiMode?: string;
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Let two models play chess against each other")
    .option("-p, --player <1|2>", "Configured agent that plays White (skips the prompt)")
    .option("-n, --games <N>", "Number of games to play", parseGameCount, 1)
    .option("--pgn <file>", "Write the games to a PGN file")
    .option("--transcript <file>", "Write the hash-chained move logs to a JSON file")
    .option("--fen <fen>", "Start from this position instead of the standard one")
    .option("--claim-draws", "Also end games on the fifty-move rule and threefold repetition")
    .option("--timeout <ms>", "Per-move timeout in ms (0 disables it)")
    .option("--base-url <url>", "OpenAI-compatible endpoint for both agents")
    .option("--api-mode <mode>", 'Endpoint kind: "completion" or "chat"')
    .action(async (opts: PlayOptions) => {
      if (opts.timeout) setCliOverride("timeoutMs", opts.timeout);
      if (opts.baseUrl) setCliOverride("baseUrl", opts.baseUrl);
      if (opts.apiMode) setCliOverride("apiMode", opts.apiMode);

      let settings: ArenaSettings;
      try {
        settings = toArenaSettings(await resolveConfig());
      } catch (err) {
        if (err instanceof ConfigError) {
          console.error(`Config error: ${err.message}`);
          process.exit(1);
        }
        throw err;
      }

      const logger = createLogger({ level: settings.logLevel });
      const registry = buildRegistry(settings);
      const names: [string, string] = [settings.agents[0].name, settings.agents[1].name];
      const seats = opts.player ? chooseSeats(opts.player, names) : await askSeats(names);

      console.log(`\nYou (${seats.player}) will play as White.`);

      const controller = new AbortController();
      process.once("SIGINT", () => {
        log("exit", "Shutting down...");
        controller.abort(new Error("Interrupted"));
      });

      const { reports, interrupted } = await playSeries({
        count: opts.games,
        seats,
        registry,
        newOracle: () => new ChessOracle({ fen: opts.fen, claimDraws: opts.claimDraws }),
        timeoutMs: settings.timeoutMs,
        logger,
        signal: controller.signal,
      });

      if (opts.pgn && reports.length > 0) {
        const pgn = reports
          .map((report, i) => exportPgn(report, { round: String(i + 1) }))
          .join("\n\n");
        await writeFile(opts.pgn, pgn + "\n", "utf-8");
        log("pgn", `Wrote ${reports.length} game(s) to ${opts.pgn}`);
      }
      if (opts.transcript && reports.length > 0) {
        await writeTranscriptFile(
          opts.transcript,
          reports.map((report) => report.transcript)
        );
        log("log", `Wrote ${reports.length} transcript(s) to ${opts.transcript}`);
      }

      process.exit(interrupted ? 130 : 0);
    });
}

export interface SeriesOptions {
  count: number;
  seats: SeatChoice;
  registry: AgentRegistry;
  /** Fresh rules oracle for each game */
  newOracle: () => IRulesOracle<ChessState>;
  timeoutMs: number | null;
  logger: Logger;
  signal: AbortSignal;
}

export interface SeriesOutcome {
  /** Finished games, in order */
  reports: GameReport[];
  /** True when the signal stopped the series before `count` games */
  interrupted: boolean;
}

/**
 * Play `count` games with the same seating. Aborting the signal ends the
 * series after the games already finished; any other failure propagates.
 */
export async function playSeries(opts: SeriesOptions): Promise<SeriesOutcome> {
  const tally = new Tally(opts.seats.player);
  const reports: GameReport[] = [];
  let interrupted = false;

  for (let i = 0; i < opts.count; i++) {
    if (opts.count > 1) {
      log("match", `--- Game ${i + 1} of ${opts.count} ---`);
    }

    const loop = new ArbitrationLoop({
      oracle: opts.newOracle(),
      agents: opts.registry.bind(opts.seats.player, opts.seats.opponent),
      proposalTimeoutMs: opts.timeoutMs,
      logger: opts.logger,
      hooks: consoleHooks(),
    });

    try {
      const report = await loop.run(opts.signal);
      printReport(report);
      tally.record(report);
      reports.push(report);
    } catch (err) {
      if (!opts.signal.aborted) throw err;
      log("exit", `Stopped during game ${i + 1}`);
      interrupted = true;
      break;
    }
  }

  if (opts.count > 1) {
    log("done", `Results: ${tally}`);
  }
  return { reports, interrupted };
}
