export {
  ConfigSchema,
  ConfigDefaults,
  logLevelSchema,
  type RawConfig,
  type RawProfile,
  type Config,
  type ProfileConfig,
  type ContextConfig,
  type SessionsConfig,
  type SecurityConfig,
} from './schema.js';
export {
  HOST_ENV,
  loadConfig,
  loadConfigWithMeta,
  getConfigPath,
  setConfigValue,
  writeConfigTemplate,
  type LoadConfigOptions,
  type LoadConfigResult,
  ConfigError,
} from './loader.js';
