export type { ConfigData } from "./defaults";
export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  isConfigKey,
} from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export { resolveConfig, setCliOverride, clearCliOverrides, getSource } from "./resolve";
export {
  toBoardSettings,
  parseRunOptions,
  parseStrategy,
  checkConfigValue,
  STRATEGIES,
} from "./settings";
export type { BoardSettings, RunOptions, StrategyName } from "./settings";
