import { IProposalSource, ProposalRequest } from "@llmduel/engine";

/**
 * Serves one request at a time from a source that is not reentrant, such
 * as a single resident model shared by several concurrent games. Requests
 * run in arrival order; a failed request does not block the ones behind it.
 */
export class SerializedProposalSource implements IProposalSource {
  readonly id: string;
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  constructor(private readonly inner: IProposalSource) {
    this.id = inner.id;
  }

  /** Requests queued or in flight */
  get queued(): number {
    return this.pending;
  }

  propose(request: ProposalRequest): Promise<string> {
    this.pending++;
    const run = async (): Promise<string> => {
      try {
        request.signal?.throwIfAborted();
        return await this.inner.propose(request);
      } finally {
        this.pending--;
      }
    };

    const result = this.tail.then(run, run);
    this.tail = result.catch(() => undefined);
    return result;
  }
}
