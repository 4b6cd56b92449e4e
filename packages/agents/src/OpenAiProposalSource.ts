import OpenAI from "openai";
import { IProposalSource, ProposalRequest } from "@llmduel/engine";
import { ApiMode, OpenAiSourceConfig } from "./types";

/**
 * Proposal source for any OpenAI-compatible endpoint (llama.cpp server,
 * Ollama, vLLM, OpenAI). One HTTP request per proposal; the SDK's own
 * retries are turned off so a turn is never silently replayed.
 */
export class OpenAiProposalSource implements IProposalSource {
  readonly id: string;
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly mode: ApiMode;
  private readonly temperature: number;

  constructor(config: OpenAiSourceConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
    this.model = config.model;
    this.mode = config.mode ?? "completion";
    this.temperature = config.temperature ?? 0;
    this.id = config.id ?? `openai:${config.model}`;
  }

  async propose(request: ProposalRequest): Promise<string> {
    if (this.mode === "chat") {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: request.prompt }],
          max_tokens: request.maxTokens,
          stop: request.stop,
          temperature: this.temperature,
        },
        { signal: request.signal }
      );
      return completion.choices[0]?.message.content ?? "";
    }

    const completion = await this.client.completions.create(
      {
        model: this.model,
        prompt: request.prompt,
        max_tokens: request.maxTokens,
        stop: request.stop,
        temperature: this.temperature,
      },
      { signal: request.signal }
    );
    return completion.choices[0]?.text ?? "";
  }
}
