export interface ProposalRequest {
  prompt: string;
  /** Upper bound on generated tokens */
  maxTokens: number;
  /** Generation stops at the first of these sequences */
  stop: string[];
  signal?: AbortSignal;
}

/**
 * A generative text model. One call per turn, never retried by the caller.
 * Implementations are not assumed reentrant.
 */
export interface IProposalSource {
  readonly id: string;
  propose(request: ProposalRequest): Promise<string>;
}

/** A proposal source plus the name it plays under. */
export interface Agent {
  name: string;
  source: IProposalSource;
}
