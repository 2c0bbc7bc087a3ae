export {
  type ClientSettings,
  type ClientSettingsValues,
  clientSettingsSchema,
  defaultSettingsSources,
  ENV_PREFIX,
  loadClientSettings,
} from "./client-settings"
export { Config, type UnknownKey } from "./config"
export { DotenvSource, type DotenvSourceOptions } from "./dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./env-source"
export { type LoadConfigOptions, loadConfig } from "./load-config"
export type { ConfigSource } from "./source"
