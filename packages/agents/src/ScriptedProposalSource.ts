import { IProposalSource, ProposalRequest } from "@llmduel/engine";

/**
 * Replays fixed replies in order, for offline runs and tests. Every request
 * is kept for inspection. Throws once the script runs out.
 */
export class ScriptedProposalSource implements IProposalSource {
  readonly requests: ProposalRequest[] = [];
  private cursor = 0;

  constructor(
    private readonly replies: readonly string[],
    readonly id = "scripted"
  ) {}

  get remaining(): number {
    return this.replies.length - this.cursor;
  }

  async propose(request: ProposalRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies[this.cursor];
    if (reply === undefined) {
      throw new Error(`Source ${this.id} has no scripted reply left (used ${this.cursor})`);
    }
    this.cursor++;
    return reply;
  }
}
