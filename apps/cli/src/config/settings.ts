import { ConfigError } from "@llmduel/core";
import { ApiMode, isApiMode } from "@llmduel/agents";
import { MAX_PROPOSAL_TIMEOUT_MS } from "@llmduel/engine";
import { ConfigData } from "./defaults";

export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: readonly LogLevelName[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

export interface AgentSettings {
  name: string;
  model: string;
  baseUrl: string;
}

/** Typed view of the resolved configuration. */
export interface ArenaSettings {
  apiKey: string;
  apiMode: ApiMode;
  /** The two configured agents, in menu order */
  agents: [AgentSettings, AgentSettings];
  /** null disables the proposal timeout */
  timeoutMs: number | null;
  logLevel: LogLevelName;
}

function parseTimeout(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(
      "timeoutMs",
      `timeoutMs must be a whole number of milliseconds (0 disables it), got "${value}"`,
    );
  }
  const ms = Number.parseInt(value, 10);
  if (ms > MAX_PROPOSAL_TIMEOUT_MS) {
    throw new ConfigError(
      "timeoutMs",
      `timeoutMs must be at most ${MAX_PROPOSAL_TIMEOUT_MS}, got "${value}"`,
    );
  }
  return ms === 0 ? null : ms;
}

export function toArenaSettings(config: ConfigData): ArenaSettings {
  if (!isApiMode(config.apiMode)) {
    throw new ConfigError(
      "apiMode",
      `apiMode must be "completion" or "chat", got "${config.apiMode}"`,
    );
  }
  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      "logLevel",
      `logLevel must be one of ${LOG_LEVELS.join(", ")}, got "${config.logLevel}"`,
    );
  }
  if (config.firstAgentName === config.secondAgentName) {
    throw new ConfigError(
      "secondAgentName",
      `Both agents are named "${config.firstAgentName}"; agent names must differ`,
    );
  }

  return {
    apiKey: config.apiKey,
    apiMode: config.apiMode,
    agents: [
      {
        name: config.firstAgentName,
        model: config.firstAgentModel,
        baseUrl: config.firstAgentBaseUrl || config.baseUrl,
      },
      {
        name: config.secondAgentName,
        model: config.secondAgentModel,
        baseUrl: config.secondAgentBaseUrl || config.baseUrl,
      },
    ],
    timeoutMs: parseTimeout(config.timeoutMs),
    logLevel: config.logLevel,
  };
}
