import { strict as assert } from "assert";
import {
  OracleInvariantViolation,
  ParsedMove,
  Side,
  TerminalCondition,
  TurnOutcome,
  createSilentLogger,
  otherSide,
  verifyTranscript,
} from "@llmduel/core";
import { AgentRegistry } from "./AgentRegistry";
import { ArbitrationLoop, MAX_PROPOSAL_TIMEOUT_MS } from "./ArbitrationLoop";
import { GameState, IRulesOracle } from "./interfaces/IRulesOracle";
import { Agent, IProposalSource, ProposalRequest } from "./interfaces/IProposalSource";
import { extractProposalToken, formatMoveToken, parseMoveToken, parseProposal } from "./notation";
import { buildTurnPrompt } from "./prompt";

// Inline a minimal oracle for testing (avoids a dependency on the chess package)
interface TestState extends GameState {
  readonly history: readonly string[];
}

const DEFAULT_LEGAL = ["a1a2", "a7a6", "a2a3", "a6a5", "b1b2", "b7b6"];

interface TestOracleOptions {
  start?: TestState;
  legal?: string[];
  endAt?: (state: TestState) => TerminalCondition | null;
  /** false makes apply forget to pass the move */
  flipSide?: boolean;
}

class TestOracle implements IRulesOracle<TestState> {
  readonly gameId = "test";
  readonly name = "Test";
  readonly positionNotation = "TXT";
  readonly moveNotation = "UCI";
  readonly moveExample = "a1a2";
  readonly sideLabels: Record<Side, string> = { first: "North", second: "South" };

  /** Token that passed isLegal and has not been applied yet */
  pendingLegal: string | null = null;
  terminalQueries = 0;
  private readonly opts: TestOracleOptions;

  constructor(opts: TestOracleOptions = {}) {
    this.opts = opts;
  }

  currentState(): TestState {
    return this.opts.start ?? { sideToMove: "first", position: "start", ply: 0, history: [] };
  }

  sideToMove(state: TestState): Side {
    return state.sideToMove;
  }

  isLegal(_state: TestState, move: ParsedMove): boolean {
    const token = formatMoveToken(move);
    const legal = (this.opts.legal ?? DEFAULT_LEGAL).includes(token);
    this.pendingLegal = legal ? token : null;
    return legal;
  }

  apply(state: TestState, move: ParsedMove): TestState {
    const token = formatMoveToken(move);
    if (this.pendingLegal !== token) {
      throw new Error(`apply(${token}) without a passing isLegal`);
    }
    this.pendingLegal = null;
    const history = [...state.history, token];
    return {
      sideToMove: this.opts.flipSide === false ? state.sideToMove : otherSide(state.sideToMove),
      position: history.join(" "),
      ply: state.ply + 1,
      history,
    };
  }

  isTerminal(state: TestState): boolean {
    return this.terminalReason(state) !== null;
  }

  terminalReason(state: TestState): TerminalCondition | null {
    this.terminalQueries++;
    return this.opts.endAt?.(state) ?? null;
  }

  formatMove(_state: TestState, move: ParsedMove): string {
    return formatMoveToken(move).toUpperCase();
  }
}

function scripted(id: string, replies: Array<string | Error>) {
  const requests: ProposalRequest[] = [];
  const source: IProposalSource = {
    id,
    async propose(request) {
      requests.push(request);
      const next = replies.shift();
      if (next === undefined) throw new Error(`${id} has no reply left`);
      if (next instanceof Error) throw next;
      return next;
    },
  };
  return { source, requests };
}

/** A source that answers only when the test says so. */
function deferred(id: string) {
  let release: (raw: string) => void = () => undefined;
  let calls = 0;
  const source: IProposalSource = {
    id,
    propose(request) {
      calls++;
      return new Promise<string>((resolve, reject) => {
        release = resolve;
        request.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    },
  };
  return { source, release: (raw: string) => release(raw), calls: () => calls };
}

function makeLoop(oracle: TestOracle, player: IProposalSource, opponent: IProposalSource) {
  const agents: Record<"player" | "opponent", Agent> = {
    player: { name: "LLaMA3", source: player },
    opponent: { name: "Gemma", source: opponent },
  };
  return new ArbitrationLoop({
    oracle,
    agents,
    matchId: "match-001",
    logger: createSilentLogger(),
    proposalTimeoutMs: 1_000,
  });
}

const drawAtPly3 = (state: TestState): TerminalCondition | null =>
  state.ply >= 3 ? { kind: "draw-by-rule", rule: "seventy-five-move" } : null;

describe("notation", () => {
  it("should take the first token of the first line", () => {
    assert.equal(extractProposalToken("e2e4"), "e2e4");
    assert.equal(extractProposalToken("  e2e4 because it is central"), "e2e4");
    assert.equal(extractProposalToken("e2e4\nbecause"), "e2e4");
    assert.equal(extractProposalToken("I think e2e4 is good"), "I");
  });

  it("should reject empty and overlong tokens", () => {
    assert.equal(extractProposalToken(""), null);
    assert.equal(extractProposalToken("   "), null);
    assert.equal(extractProposalToken("\ne2e4"), null);
    assert.equal(extractProposalToken("e2e4e2e4e2e"), null);
    assert.equal(extractProposalToken("e2e4e2e4e2"), "e2e4e2e4e2");
    assert.equal(extractProposalToken("e2e4q", 4), null);
  });

  it("should parse coordinate moves strictly", () => {
    assert.deepEqual(parseMoveToken("e2e4"), { from: "e2", to: "e4" });
    assert.deepEqual(parseMoveToken("E2E4"), { from: "e2", to: "e4" });
    assert.deepEqual(parseMoveToken("e7e8Q"), { from: "e7", to: "e8", promotion: "q" });
    assert.equal(parseMoveToken("z9z9"), null);
    assert.equal(parseMoveToken("e2e4k"), null);
    assert.equal(parseMoveToken("e2-e4"), null);
    assert.equal(parseMoveToken("e2e"), null);
    assert.equal(parseMoveToken("0000"), null);
    assert.equal(parseMoveToken("I"), null);
  });

  it("should parse a whole proposal", () => {
    assert.deepEqual(parseProposal(" g1f3\n"), { from: "g1", to: "f3" });
    assert.equal(parseProposal("Nf3"), null);
    assert.equal(formatMoveToken({ from: "a7", to: "a8", promotion: "n" }), "a7a8n");
  });
});

describe("buildTurnPrompt", () => {
  it("should describe the position and the reply format", () => {
    const oracle = new TestOracle();
    const prompt = buildTurnPrompt(oracle, oracle.currentState());

    assert.equal(
      prompt,
      [
        "You are a test master playing a game as North.",
        "Rules of this exchange: you answer with exactly one legal move in UCI notation (e.g. a1a2).",
        "A reply that is not a single move, or a move that is not legal in this position, loses the game immediately.",
        "Here is the current board in TXT: start",
        "Please provide your next move in UCI format. Just give the move only, no explanation.",
      ].join("\n")
    );
    assert.equal(buildTurnPrompt(oracle, oracle.currentState()), prompt);
  });
});

describe("AgentRegistry", () => {
  it("should register agents and bind seats", () => {
    const registry = new AgentRegistry();
    registry.register({ name: "LLaMA3", source: scripted("llama", []).source });
    registry.register({ name: "Gemma", source: scripted("gemma", []).source });

    assert.equal(registry.has("LLaMA3"), true);
    assert.equal(registry.list().length, 2);

    const seats = registry.bind("Gemma", "LLaMA3");
    assert.equal(seats.player.name, "Gemma");
    assert.equal(seats.opponent.name, "LLaMA3");
  });

  it("should refuse duplicate names, unknown agents and self-play", () => {
    const registry = new AgentRegistry();
    registry.register({ name: "LLaMA3", source: scripted("llama", []).source });

    assert.throws(
      () => registry.register({ name: "LLaMA3", source: scripted("other", []).source }),
      /already registered/
    );
    assert.throws(() => registry.bind("LLaMA3", "Mistral"), /Unknown agent "Mistral" \(registered: LLaMA3\)/);
    assert.throws(() => registry.bind("LLaMA3", "LLaMA3"), /cannot occupy both seats/);
  });
});

describe("ArbitrationLoop", () => {
  it("should alternate seats until the oracle reports a draw", async () => {
    const oracle = new TestOracle({ endAt: drawAtPly3 });
    const player = scripted("llama", ["a1a2", "a2a3"]);
    const opponent = scripted("gemma", ["a7a6"]);
    const loop = makeLoop(oracle, player.source, opponent.source);

    const report = await loop.run();

    assert.deepEqual(report.result, { kind: "draw-by-rule", rule: "seventy-five-move" });
    assert.equal(report.score, "1/2-1/2");
    assert.equal(report.winner, null);
    assert.equal(report.loser, null);
    assert.equal(report.plies, 3);
    assert.equal(report.startPosition, "start");
    assert.equal(report.finalPosition, "a1a2 a7a6 a2a3");
    assert.deepEqual(
      report.moves.map((m) => [m.ply, m.seat, m.side, m.agent, m.uci, m.san]),
      [
        [1, "player", "first", "LLaMA3", "a1a2", "A1A2"],
        [2, "opponent", "second", "Gemma", "a7a6", "A7A6"],
        [3, "player", "first", "LLaMA3", "a2a3", "A2A3"],
      ]
    );
    assert.deepEqual(
      report.transcript.entries.map((e) => [e.agent, e.seat, e.move]),
      [
        ["LLaMA3", "player", "a1a2"],
        ["Gemma", "opponent", "a7a6"],
        ["LLaMA3", "player", "a2a3"],
      ]
    );
    assert.equal(report.transcript.startPosition, "start");
    assert.deepEqual(verifyTranscript(report.transcript), {
      ok: true,
      rootHash: report.transcript.rootHash,
    });
    assert.equal(player.requests.length, 2);
    assert.equal(opponent.requests.length, 1);
  });

  it("should bound every proposal request", async () => {
    const oracle = new TestOracle({ endAt: (s) => (s.ply >= 1 ? { kind: "stalemate" } : null) });
    const player = scripted("llama", ["a1a2"]);
    const loop = makeLoop(oracle, player.source, scripted("gemma", []).source);

    await loop.run();

    const request = player.requests[0];
    assert.equal(request.maxTokens, 10);
    assert.deepEqual(request.stop, ["\n"]);
    assert.ok(request.signal instanceof AbortSignal);
    assert.match(request.prompt, /Here is the current board in TXT: start$/m);
  });

  it("should resolve a checkmate on the board without asking anyone", async () => {
    const oracle = new TestOracle({
      start: { sideToMove: "second", position: "mated", ply: 7, history: [] },
      endAt: () => ({ kind: "checkmate" }),
    });
    const player = scripted("llama", ["a1a2"]);
    const opponent = scripted("gemma", ["a7a6"]);
    const loop = makeLoop(oracle, player.source, opponent.source);

    const report = await loop.run();

    assert.deepEqual(report.result, { kind: "checkmate", winner: "player" });
    assert.equal(report.score, "1-0");
    assert.deepEqual(report.winner, { name: "LLaMA3", seat: "player" });
    assert.deepEqual(report.loser, { name: "Gemma", seat: "opponent" });
    assert.equal(player.requests.length, 0);
    assert.equal(opponent.requests.length, 0);
  });

  it("should forfeit an illegal move to the other seat", async () => {
    const oracle = new TestOracle();
    const player = scripted("llama", ["a1a2"]);
    const opponent = scripted("gemma", ["h7h5"]);
    const outcomes: TurnOutcome[] = [];
    const loop = new ArbitrationLoop({
      oracle,
      agents: {
        player: { name: "LLaMA3", source: player.source },
        opponent: { name: "Gemma", source: opponent.source },
      },
      logger: createSilentLogger(),
      hooks: { onTurnOutcome: (_ctx, outcome) => outcomes.push(outcome) },
    });

    const report = await loop.run();

    assert.deepEqual(report.result, { kind: "forfeit-illegal-move", loser: "opponent", proposal: "h7h5" });
    assert.equal(report.score, "1-0");
    assert.equal(report.winner?.name, "LLaMA3");
    assert.equal(report.plies, 1);
    assert.deepEqual(
      outcomes.map((o) => o.kind),
      ["applied", "illegal-move"]
    );
    assert.equal(oracle.pendingLegal, null);
  });

  it("should forfeit a proposal with extra words as malformed", async () => {
    const oracle = new TestOracle();
    const player = scripted("llama", ["I think a1a2 is good"]);
    const loop = makeLoop(oracle, player.source, scripted("gemma", []).source);

    const report = await loop.run();

    assert.deepEqual(report.result, {
      kind: "forfeit-malformed-proposal",
      loser: "player",
      proposal: "I think a1a2 is good",
      error: '"I" is not a UCI move',
    });
    assert.equal(report.score, "0-1");
    assert.equal(report.winner?.name, "Gemma");
    assert.equal(report.plies, 0);
  });

  it("should treat a failing source as a malformed proposal", async () => {
    const oracle = new TestOracle();
    const player = scripted("llama", ["a1a2"]);
    const opponent = scripted("gemma", [new Error("connection refused")]);
    const loop = makeLoop(oracle, player.source, opponent.source);

    const report = await loop.run();

    assert.deepEqual(report.result, {
      kind: "forfeit-malformed-proposal",
      loser: "opponent",
      proposal: "",
      error: "connection refused",
    });
    assert.equal(report.winner?.name, "LLaMA3");
  });

  it("should forfeit a proposal that outlives the timeout", async () => {
    const oracle = new TestOracle();
    const slow = deferred("slow");
    const loop = new ArbitrationLoop({
      oracle,
      agents: {
        player: { name: "LLaMA3", source: slow.source },
        opponent: { name: "Gemma", source: scripted("gemma", []).source },
      },
      logger: createSilentLogger(),
      proposalTimeoutMs: 20,
    });

    const report = await loop.run();

    assert.deepEqual(report.result, {
      kind: "forfeit-malformed-proposal",
      loser: "player",
      proposal: "",
      error: "Proposal timed out after 20ms",
    });
  });

  it("should wait out a long timeout instead of forfeiting at once", async () => {
    const oracle = new TestOracle({ endAt: (s) => (s.ply >= 1 ? { kind: "stalemate" } : null) });
    const slowButLegal: IProposalSource = {
      id: "slow-but-legal",
      propose: () => new Promise<string>((resolve) => setTimeout(() => resolve("a1a2"), 50)),
    };
    const loop = new ArbitrationLoop({
      oracle,
      agents: {
        player: { name: "LLaMA3", source: slowButLegal },
        opponent: { name: "Gemma", source: scripted("gemma", []).source },
      },
      logger: createSilentLogger(),
      proposalTimeoutMs: MAX_PROPOSAL_TIMEOUT_MS,
    });

    const report = await loop.run();

    assert.deepEqual(report.result, { kind: "stalemate" });
    assert.equal(report.plies, 1);
  });

  it("should refuse a timeout a timer cannot hold", () => {
    const agents = {
      player: { name: "LLaMA3", source: scripted("llama", []).source },
      opponent: { name: "Gemma", source: scripted("gemma", []).source },
    };
    for (const proposalTimeoutMs of [3_000_000_000, MAX_PROPOSAL_TIMEOUT_MS + 1, 0, -5, 1.5]) {
      assert.throws(
        () => new ArbitrationLoop({ oracle: new TestOracle(), agents, proposalTimeoutMs }),
        (err: unknown) => {
          assert.ok(err instanceof RangeError);
          assert.match(err.message, new RegExp(`got ${proposalTimeoutMs}$`));
          return true;
        }
      );
    }
  });

  it("should stay resolved once the game is over", async () => {
    const oracle = new TestOracle();
    const player = scripted("llama", ["e2e4e2e4e2e4"]);
    const loop = makeLoop(oracle, player.source, scripted("gemma", []).source);

    const first = await loop.step();
    const again = await loop.step();

    assert.equal(first.phase, "resolved");
    assert.equal(again, first);
    assert.equal(player.requests.length, 1);
    assert.equal(loop.getReport()?.result.kind, "forfeit-malformed-proposal");
  });

  it("should report whose turn it is between steps", async () => {
    const oracle = new TestOracle();
    const loop = makeLoop(
      oracle,
      scripted("llama", ["a1a2"]).source,
      scripted("gemma", ["a7a6"]).source
    );

    assert.deepEqual(loop.getStatus(), { phase: "awaiting-proposal", seat: "player" });
    assert.deepEqual(await loop.step(), { phase: "awaiting-proposal", seat: "opponent" });
    assert.equal(loop.getState().ply, 1);
    assert.equal(loop.getState().sideToMove, "second");
    assert.deepEqual(await loop.step(), { phase: "awaiting-proposal", seat: "player" });
    assert.equal(loop.getState().sideToMove, "first");
    assert.equal(loop.getReport(), null);
  });

  it("should reject a second step while a turn is unresolved", async () => {
    const oracle = new TestOracle({ endAt: (s) => (s.ply >= 1 ? { kind: "insufficient-material" } : null) });
    const slow = deferred("slow");
    const loop = makeLoop(oracle, slow.source, scripted("gemma", []).source);

    const pending = loop.step();
    await assert.rejects(loop.step(), /already in progress/);
    slow.release("a1a2");

    assert.deepEqual(await pending, { phase: "resolved", result: { kind: "insufficient-material" } });
    assert.equal(slow.calls(), 1);
  });

  it("should stop without adjudicating when aborted mid-proposal", async () => {
    const oracle = new TestOracle();
    const slow = deferred("slow");
    const loop = makeLoop(oracle, slow.source, scripted("gemma", []).source);
    const controller = new AbortController();

    const running = loop.run(controller.signal);
    controller.abort(new Error("operator stopped the game"));

    await assert.rejects(running, /operator stopped the game/);
    assert.deepEqual(loop.getStatus(), { phase: "awaiting-proposal", seat: "player" });
    assert.equal(loop.getReport(), null);
  });

  it("should stop when aborted even if the source ignores the signal", async () => {
    const oracle = new TestOracle();
    let asked = 0;
    const stubborn: IProposalSource = {
      id: "stubborn",
      propose() {
        asked++;
        return new Promise<string>(() => undefined);
      },
    };
    const loop = new ArbitrationLoop({
      oracle,
      agents: {
        player: { name: "LLaMA3", source: stubborn },
        opponent: { name: "Gemma", source: scripted("gemma", []).source },
      },
      logger: createSilentLogger(),
      proposalTimeoutMs: null,
    });
    const controller = new AbortController();

    const running = loop.run(controller.signal);
    setTimeout(() => controller.abort(new Error("operator stopped the game")), 20);

    await assert.rejects(running, /operator stopped the game/);
    assert.equal(asked, 1);
    assert.equal(loop.getReport(), null);
  });

  it("should throw when the oracle does not pass the move", async () => {
    const oracle = new TestOracle({ flipSide: false });
    const loop = makeLoop(oracle, scripted("llama", ["a1a2"]).source, scripted("gemma", []).source);

    await assert.rejects(loop.run(), (err: unknown) => {
      assert.ok(err instanceof OracleInvariantViolation);
      assert.match(err.message, /side to move did not pass after a1a2/);
      return true;
    });
  });

  it("should call the hooks in turn order", async () => {
    const oracle = new TestOracle({ endAt: (s) => (s.ply >= 1 ? { kind: "stalemate" } : null) });
    const events: string[] = [];
    const loop = new ArbitrationLoop({
      oracle,
      agents: {
        player: { name: "LLaMA3", source: scripted("llama", ["a1a2"]).source },
        opponent: { name: "Gemma", source: scripted("gemma", []).source },
      },
      logger: createSilentLogger(),
      hooks: {
        onTurnStart: (ctx) => events.push(`start:${ctx.seat}:${ctx.ply}`),
        onProposal: (_ctx, raw) => events.push(`proposal:${raw}`),
        onTurnOutcome: (_ctx, outcome, next) => events.push(`${outcome.kind}:${next.ply}`),
        onResolved: (report) => events.push(`resolved:${report.result.kind}`),
      },
    });

    await loop.run();

    assert.deepEqual(events, [
      "start:player:0",
      "proposal:a1a2",
      "applied:1",
      "resolved:stalemate",
    ]);
  });
});
