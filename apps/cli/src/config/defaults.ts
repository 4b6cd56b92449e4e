export interface ConfigData {
  /** OpenAI-compatible endpoint shared by both agents */
  baseUrl: string;
  apiKey: string;
  /** "completion" or "chat" */
  apiMode: string;
  firstAgentName: string;
  firstAgentModel: string;
  /** Overrides baseUrl for the first agent when set */
  firstAgentBaseUrl: string;
  secondAgentName: string;
  secondAgentModel: string;
  secondAgentBaseUrl: string;
  /** Per-proposal timeout in ms; 0 disables it */
  timeoutMs: string;
  logLevel: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "baseUrl",
  "apiKey",
  "apiMode",
  "firstAgentName",
  "firstAgentModel",
  "firstAgentBaseUrl",
  "secondAgentName",
  "secondAgentModel",
  "secondAgentBaseUrl",
  "timeoutMs",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  baseUrl: "http://127.0.0.1:8080/v1",
  apiKey: "sk-no-key-required",
  apiMode: "completion",
  firstAgentName: "LLaMA3",
  firstAgentModel: "llama-3.2-3b-instruct",
  firstAgentBaseUrl: "",
  secondAgentName: "Gemma",
  secondAgentModel: "gemma-3-4b-it",
  secondAgentBaseUrl: "",
  timeoutMs: "60000",
  logLevel: "warn",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  baseUrl: "LLMDUEL_BASE_URL",
  apiKey: "LLMDUEL_API_KEY",
  apiMode: "LLMDUEL_API_MODE",
  firstAgentName: "LLMDUEL_FIRST_AGENT_NAME",
  firstAgentModel: "LLMDUEL_FIRST_AGENT_MODEL",
  firstAgentBaseUrl: "LLMDUEL_FIRST_AGENT_BASE_URL",
  secondAgentName: "LLMDUEL_SECOND_AGENT_NAME",
  secondAgentModel: "LLMDUEL_SECOND_AGENT_MODEL",
  secondAgentBaseUrl: "LLMDUEL_SECOND_AGENT_BASE_URL",
  timeoutMs: "LLMDUEL_TIMEOUT_MS",
  logLevel: "LOG_LEVEL",
};

/** Keys whose values are masked when printed */
export const SECRET_KEYS: readonly (keyof ConfigData)[] = ["apiKey"];

export function isConfigKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}
