export {
  ArbitrationLoop,
  DEFAULT_MAX_TOKENS,
  DEFAULT_PROPOSAL_TIMEOUT_MS,
  MAX_PROPOSAL_TIMEOUT_MS,
  PROPOSAL_STOP,
} from "./ArbitrationLoop";
export type {
  ArbitrationHooks,
  ArbitrationLoopOptions,
  LoopStatus,
  TurnContext,
} from "./ArbitrationLoop";
export { AgentRegistry } from "./AgentRegistry";
export {
  DEFAULT_MAX_PROPOSAL_LENGTH,
  extractProposalToken,
  formatMoveToken,
  parseMoveToken,
  parseProposal,
} from "./notation";
export { buildTurnPrompt } from "./prompt";
export type { GameState, IRulesOracle } from "./interfaces/IRulesOracle";
export type { Agent, IProposalSource, ProposalRequest } from "./interfaces/IProposalSource";
