/**
 * Config — schemas and the JSON file loader.
 */

export {
  ConfigFileSchema,
  ServerConfigSchema,
  WatcherConfigSchema,
  LlmConfigSchema,
  GmailCredentialsSchema,
  HandoffConfigSchema,
} from './schemas.js'
export type {
  Config,
  ConfigFile,
  ServerConfig,
  WatcherConfig,
  LlmConfig,
  GmailCredentials,
} from './schemas.js'
export { loadConfig, parseConfig, resolveConfig, expandValue, defaultConfigPath } from './loader.js'
export type { LoadConfigOptions } from './loader.js'
