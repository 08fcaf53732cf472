/**
 * LBSON: BSON documents whose values may carry security labels.
 *
 * The trusted bridge (`labelTCB`, `unlabelTCB`) is not exported here; it
 * lives at `lbson/tcb`.
 */

export * from './bson/index.js'
export * from './lio/index.js'
export * from './lbson/index.js'

export {
  setRenderMode,
  getRenderMode,
  isDebugRendering,
  isRenderModeFixed,
  resetRenderMode,
  type RenderMode,
} from './render-mode.js'

export { bootstrap, type BootstrapOptions, type Runtime } from './bootstrap.js'

export {
  loadConfig,
  validateConfig,
  ConfigError,
  AppConfigSchema,
  type AppConfig,
  type CLIArgs,
} from './config/index.js'

export {
  AuditLogger,
  JsonlAuditStore,
  type AuditStore,
  type AuditEntry,
  type AuditCategory,
  type AuditSeverity,
} from './audit/index.js'
