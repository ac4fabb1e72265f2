export {
  ConfigSchema,
  AISettingsSchema,
  QualityTierSchema,
  ProviderSchema,
} from "./schema.js";
export type { AISettings, Config, ConfigInput, ProviderSetting, QualityTierSetting } from "./schema.js";
export {
  CONFIG_FILE_NAME,
  applyEnvironment,
  formatConfigIssues,
  loadConfig,
  mergeConfig,
  parseConfig,
  readConfigFile,
} from "./loader.js";
export type { LoadConfigOptions, RawConfig } from "./loader.js";
