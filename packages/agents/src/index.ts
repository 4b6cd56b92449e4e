export { OpenAiProposalSource } from "./OpenAiProposalSource";
export { SerializedProposalSource } from "./SerializedProposalSource";
export { ScriptedProposalSource } from "./ScriptedProposalSource";
export { API_MODES, isApiMode } from "./types";
export type { ApiMode, OpenAiSourceConfig } from "./types";

export type { Agent, IProposalSource, ProposalRequest } from "@llmduel/engine";
