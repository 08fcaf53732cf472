// Schema and types
export {
  AppConfigSchema,
  EnvironmentSchema,
  type AppConfig,
  type Environment,
  type RenderingConfig,
  type LoggingConfig,
} from './schema.js'

// Errors
export { ConfigError, type ConfigErrorCode } from './errors.js'

// Defaults
export { getDefaults } from './defaults.js'

// Paths
export {
  getLbsonHome,
  getConfigPath,
  getLocalConfigPath,
  getLogsPath,
  getAuditPath,
} from './paths.js'

// Environment parsing
export { parseEnvConfig, parseValue, parseCLIConfig, type CLIArgs } from './env.js'

// File utilities
export { fileExists, loadConfigFile } from './file.js'

// Merge utilities
export { deepMerge, setPath, isRecord, type ConfigRecord } from './merge.js'

// Loader
export { loadConfig } from './loader.js'

// Validation
export {
  validateConfig,
  DEBUG_RENDERING_ENVIRONMENTS,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
} from './validation.js'
