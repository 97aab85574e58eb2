export {
  RelayConfigSchema,
  DEFAULT_CONFIG,
  DEFAULT_BACKENDS,
  type RelayConfig,
  type LogLevel,
} from './schema.js';
export { loadConfig, deepMerge, ConfigError, type LoadConfigOptions } from './loader.js';
export {
  validateConfig,
  BACKEND_PLACEHOLDER,
  PROMPT_PLACEHOLDER,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
} from './validator.js';
export { resolveRelayHome, resolveConfigPath, ensureRelayHome, CONFIG_FILE_NAME } from './paths.js';
