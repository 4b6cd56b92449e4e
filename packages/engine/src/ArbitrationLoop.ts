import { randomUUID } from "node:crypto";
import {
  AgentRef,
  GameReport,
  GameResult,
  Logger,
  MoveRecord,
  OracleInvariantViolation,
  ParsedMove,
  Seat,
  TerminalCondition,
  TranscriptBuilder,
  TurnOutcome,
  log as rootLog,
  otherSeat,
  otherSide,
  scoreFor,
  seatForSide,
  winningSeat,
} from "@llmduel/core";
import { Agent } from "./interfaces/IProposalSource";
import { GameState, IRulesOracle } from "./interfaces/IRulesOracle";
import {
  DEFAULT_MAX_PROPOSAL_LENGTH,
  extractProposalToken,
  formatMoveToken,
  parseMoveToken,
} from "./notation";
import { buildTurnPrompt } from "./prompt";

export const DEFAULT_PROPOSAL_TIMEOUT_MS = 60_000;
/** Largest delay a Node timer honours; longer ones fire after 1 ms. */
export const MAX_PROPOSAL_TIMEOUT_MS = 2_147_483_647;
export const DEFAULT_MAX_TOKENS = 10;
export const PROPOSAL_STOP: readonly string[] = ["\n"];

export type LoopStatus =
  | { phase: "awaiting-proposal"; seat: Seat }
  | { phase: "resolved"; result: GameResult };

export interface TurnContext<S extends GameState> {
  matchId: string;
  ply: number;
  seat: Seat;
  agent: Agent;
  state: S;
  prompt: string;
}

/** Observation points for rendering layers. Hooks must not throw. */
export interface ArbitrationHooks<S extends GameState> {
  onTurnStart?(ctx: TurnContext<S>): void;
  onProposal?(ctx: TurnContext<S>, raw: string): void;
  onTurnOutcome?(ctx: TurnContext<S>, outcome: TurnOutcome, next: S): void;
  onResolved?(report: GameReport): void;
}

export interface ArbitrationLoopOptions<S extends GameState> {
  oracle: IRulesOracle<S>;
  agents: Record<Seat, Agent>;
  matchId?: string;
  /** `null` disables the per-proposal timer */
  proposalTimeoutMs?: number | null;
  maxTokens?: number;
  maxProposalLength?: number;
  logger?: Logger;
  hooks?: ArbitrationHooks<S>;
}

type ProposalReply = { ok: true; raw: string } | { ok: false; error: string };

/**
 * Drives exactly one game from the oracle's current state to a GameResult.
 *
 * Every turn produces exactly one TurnOutcome. Anything other than an
 * applied move ends the game at once with the acting seat forfeiting; there
 * are no retries. Oracle contract breaches are thrown as
 * OracleInvariantViolation and never turned into game results.
 */
export class ArbitrationLoop<S extends GameState = GameState> {
  private readonly oracle: IRulesOracle<S>;
  private readonly agents: Record<Seat, Agent>;
  private readonly matchId: string;
  private readonly timeoutMs: number | null;
  private readonly maxTokens: number;
  private readonly maxProposalLength: number;
  private readonly log: Logger;
  private readonly hooks: ArbitrationHooks<S>;
  private readonly startPosition: string;
  private readonly transcript: TranscriptBuilder;
  private readonly moves: MoveRecord[] = [];
  private state: S;
  private status: LoopStatus;
  private report: GameReport | null = null;
  private turnInFlight = false;

  constructor(opts: ArbitrationLoopOptions<S>) {
    this.oracle = opts.oracle;
    this.agents = { player: opts.agents.player, opponent: opts.agents.opponent };
    this.matchId = opts.matchId ?? randomUUID();
    this.timeoutMs =
      opts.proposalTimeoutMs === undefined ? DEFAULT_PROPOSAL_TIMEOUT_MS : opts.proposalTimeoutMs;
    if (
      this.timeoutMs !== null &&
      !(Number.isInteger(this.timeoutMs) && this.timeoutMs > 0 && this.timeoutMs <= MAX_PROPOSAL_TIMEOUT_MS)
    ) {
      throw new RangeError(
        `proposalTimeoutMs must be a whole number from 1 to ${MAX_PROPOSAL_TIMEOUT_MS}, or null; got ${this.timeoutMs}`
      );
    }
    this.maxTokens = opts.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxProposalLength = opts.maxProposalLength ?? DEFAULT_MAX_PROPOSAL_LENGTH;
    this.log = (opts.logger ?? rootLog).child({
      component: "arbitration",
      matchId: this.matchId,
    });
    this.hooks = opts.hooks ?? {};

    this.state = this.oracle.currentState();
    this.startPosition = this.state.position;
    this.transcript = new TranscriptBuilder(this.matchId, this.oracle.gameId, this.startPosition);
    this.status = {
      phase: "awaiting-proposal",
      seat: seatForSide(this.oracle.sideToMove(this.state)),
    };
  }

  getMatchId(): string {
    return this.matchId;
  }

  getState(): S {
    return this.state;
  }

  getStatus(): LoopStatus {
    return this.status;
  }

  getMoves(): MoveRecord[] {
    return [...this.moves];
  }

  /** The final report, or null while the game is still running. */
  getReport(): GameReport | null {
    return this.report;
  }

  /**
   * Play the game to the end. An aborted signal stops the loop between
   * turns, or during a proposal without adjudicating it, and rejects with
   * the signal's reason.
   */
  async run(signal?: AbortSignal): Promise<GameReport> {
    let status = this.status;
    while (status.phase !== "resolved") {
      signal?.throwIfAborted();
      status = await this.step(signal);
    }
    if (!this.report) {
      throw new Error("Game resolved without a report");
    }
    return this.report;
  }

  /** Resolve one turn. Once resolved, returns the same status forever. */
  async step(signal?: AbortSignal): Promise<LoopStatus> {
    if (this.status.phase === "resolved") return this.status;
    if (this.turnInFlight) {
      throw new Error(`A turn is already in progress in match ${this.matchId}`);
    }

    this.turnInFlight = true;
    try {
      return await this.playTurn(signal);
    } finally {
      this.turnInFlight = false;
    }
  }

  private async playTurn(signal?: AbortSignal): Promise<LoopStatus> {
    const state = this.state;

    if (this.oracle.isTerminal(state)) {
      return this.resolve(this.fromTerminal(state));
    }

    const side = this.oracle.sideToMove(state);
    const seat = seatForSide(side);
    const ctx: TurnContext<S> = {
      matchId: this.matchId,
      ply: state.ply,
      seat,
      agent: this.agents[seat],
      state,
      prompt: buildTurnPrompt(this.oracle, state),
    };
    this.status = { phase: "awaiting-proposal", seat };
    this.hooks.onTurnStart?.(ctx);
    this.log.debug({ seat, agent: ctx.agent.name, ply: ctx.ply, prompt: ctx.prompt }, "prompt built");

    const startedAt = Date.now();
    const reply = await this.requestProposal(ctx, signal);
    const durationMs = Date.now() - startedAt;
    const raw = reply.ok ? reply.raw : "";
    this.hooks.onProposal?.(ctx, raw);
    this.log.info({ seat, agent: ctx.agent.name, ply: ctx.ply, raw, durationMs }, "proposal received");

    const outcome: TurnOutcome = reply.ok
      ? this.adjudicate(state, reply.raw)
      : { kind: "malformed-proposal", raw: "", error: reply.error };

    if (outcome.kind !== "applied") {
      this.hooks.onTurnOutcome?.(ctx, outcome, state);
      this.log.warn(
        { seat, agent: ctx.agent.name, outcome: outcome.kind, raw: outcome.raw },
        "agent forfeits"
      );
      return this.resolve(this.forfeit(seat, outcome));
    }

    const next = this.applyChecked(state, outcome.move);
    const uci = formatMoveToken(outcome.move);
    this.state = next;
    this.moves.push({
      ply: next.ply,
      seat,
      agent: ctx.agent.name,
      side,
      uci,
      san: outcome.san,
      fenBefore: state.position,
      fenAfter: next.position,
      durationMs,
    });
    this.transcript.record({ agent: ctx.agent.name, seat, move: uci, position: next.position });
    this.hooks.onTurnOutcome?.(ctx, outcome, next);
    this.log.info({ seat, agent: ctx.agent.name, ply: next.ply, uci, san: outcome.san }, "move applied");

    if (this.oracle.isTerminal(next)) {
      return this.resolve(this.fromTerminal(next));
    }
    this.status = { phase: "awaiting-proposal", seat: otherSeat(seat) };
    return this.status;
  }

  private async requestProposal(
    ctx: TurnContext<S>,
    signal?: AbortSignal
  ): Promise<ProposalReply> {
    const controller = new AbortController();
    let cancel: ((reason: unknown) => void) | undefined;
    const cancelled = new Promise<never>((_resolve, reject) => {
      cancel = reject;
    });
    const onAbort = () => {
      cancel?.(signal?.reason);
      controller.abort(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    const timeoutMs = this.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<never>((_resolve, reject) => {
      if (timeoutMs === null) return;
      timer = setTimeout(() => {
        // Settle first so the race reports the timeout, not the abort.
        reject(new Error(`Proposal timed out after ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });

    try {
      const raw = await Promise.race([
        ctx.agent.source.propose({
          prompt: ctx.prompt,
          maxTokens: this.maxTokens,
          stop: [...PROPOSAL_STOP],
          signal: controller.signal,
        }),
        expiry,
        cancelled,
      ]);
      signal?.throwIfAborted();
      return { ok: true, raw };
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      const error = err instanceof Error ? err.message : String(err);
      this.log.warn({ agent: ctx.agent.name, source: ctx.agent.source.id, err }, "proposal source failed");
      return { ok: false, error };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private adjudicate(state: S, raw: string): TurnOutcome {
    const token = extractProposalToken(raw, this.maxProposalLength);
    if (token === null) {
      return {
        kind: "malformed-proposal",
        raw,
        error: `no move token of at most ${this.maxProposalLength} characters`,
      };
    }

    const move = parseMoveToken(token);
    if (!move) {
      return {
        kind: "malformed-proposal",
        raw,
        error: `"${token}" is not a ${this.oracle.moveNotation} move`,
      };
    }

    if (!this.oracle.isLegal(state, move)) {
      return { kind: "illegal-move", raw, move };
    }
    return { kind: "applied", move, san: this.oracle.formatMove(state, move) };
  }

  private applyChecked(state: S, move: ParsedMove): S {
    const token = formatMoveToken(move);
    let next: S;
    try {
      next = this.oracle.apply(state, move);
    } catch (err) {
      throw this.violation(`apply rejected ${token} after isLegal accepted it`, err);
    }

    const mover = this.oracle.sideToMove(state);
    if (this.oracle.sideToMove(next) !== otherSide(mover)) {
      throw this.violation(`side to move did not pass after ${token}`);
    }
    if (next.ply !== state.ply + 1) {
      throw this.violation(`ply went from ${state.ply} to ${next.ply} after ${token}`);
    }
    return next;
  }

  private violation(message: string, cause?: unknown): OracleInvariantViolation {
    const err =
      cause instanceof OracleInvariantViolation
        ? cause
        : new OracleInvariantViolation(message, { cause });
    this.log.error({ err }, "rules oracle broke its contract");
    return err;
  }

  private fromTerminal(state: S): GameResult {
    const reason: TerminalCondition | null = this.oracle.terminalReason(state);
    if (!reason) {
      throw this.violation("isTerminal is true but terminalReason is null");
    }

    switch (reason.kind) {
      case "checkmate":
        // The mated side is the one left to move.
        return {
          kind: "checkmate",
          winner: seatForSide(otherSide(this.oracle.sideToMove(state))),
        };
      case "stalemate":
        return { kind: "stalemate" };
      case "insufficient-material":
        return { kind: "insufficient-material" };
      case "draw-by-rule":
        return { kind: "draw-by-rule", rule: reason.rule };
    }
  }

  private forfeit(
    seat: Seat,
    outcome: Exclude<TurnOutcome, { kind: "applied" }>
  ): GameResult {
    if (outcome.kind === "illegal-move") {
      return { kind: "forfeit-illegal-move", loser: seat, proposal: outcome.raw };
    }
    return {
      kind: "forfeit-malformed-proposal",
      loser: seat,
      proposal: outcome.raw,
      error: outcome.error,
    };
  }

  private resolve(result: GameResult): LoopStatus {
    this.status = { phase: "resolved", result };

    const seats: Record<Seat, AgentRef> = {
      player: { name: this.agents.player.name, seat: "player" },
      opponent: { name: this.agents.opponent.name, seat: "opponent" },
    };
    const winner = winningSeat(result);
    this.report = {
      matchId: this.matchId,
      gameId: this.oracle.gameId,
      result,
      score: scoreFor(result),
      winner: winner ? seats[winner] : null,
      loser: winner ? seats[otherSeat(winner)] : null,
      seats,
      plies: this.moves.length,
      startPosition: this.startPosition,
      finalPosition: this.state.position,
      moves: [...this.moves],
      transcript: this.transcript.build(),
    };

    this.log.info(
      {
        result,
        score: this.report.score,
        winner: this.report.winner?.name ?? null,
        rootHash: this.report.transcript.rootHash,
      },
      "game resolved"
    );
    this.hooks.onResolved?.(this.report);
    return this.status;
  }
}
