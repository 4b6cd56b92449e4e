export type { ConfigData } from "./defaults";
export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  SECRET_KEYS,
  isConfigKey,
} from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export { resolveConfig, setCliOverride, clearCliOverrides } from "./resolve";
export { toArenaSettings } from "./settings";
export type { AgentSettings, ArenaSettings, LogLevelName } from "./settings";
