export type { ConfigData } from "./defaults";
export { CONFIG_KEYS, DEFAULTS, ENV_MAP } from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigPath,
  isConfigKey,
} from "./configFile";
export { mergeConfig, resolveConfig, setCliOverride } from "./resolve";
