/** Which OpenAI endpoint a source talks to. */
export type ApiMode = "completion" | "chat";

export const API_MODES: readonly ApiMode[] = ["completion", "chat"];

export function isApiMode(value: string): value is ApiMode {
  return value === "completion" || value === "chat";
}

export interface OpenAiSourceConfig {
  /** Model name as the endpoint knows it, e.g. "llama-3.2-3b-instruct" */
  model: string;
  /** OpenAI-compatible base URL, e.g. "http://127.0.0.1:8080/v1" */
  baseUrl?: string;
  /** Local servers accept any value */
  apiKey: string;
  /**
   * "completion" sends the prompt verbatim to /completions, the way local
   * instruct models served by llama.cpp expect it. "chat" wraps it in a
   * single user message. Defaults to "completion".
   */
  mode?: ApiMode;
  /** Defaults to 0 */
  temperature?: number;
  /** Source id in logs; defaults to "openai:<model>" */
  id?: string;
}
