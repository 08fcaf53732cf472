import { AuditLogger } from './audit/service.js'
import { JsonlAuditStore } from './audit/store/jsonl.js'
import { ConfigError } from './config/errors.js'
import type { CLIArgs } from './config/env.js'
import { loadConfig } from './config/loader.js'
import { getAuditPath } from './config/paths.js'
import type { AppConfig } from './config/schema.js'
import { validateConfig, type ValidationWarning } from './config/validation.js'
import { setRenderMode, type RenderMode } from './render-mode.js'

export interface BootstrapOptions {
  cliArgs?: CLIArgs
  env?: NodeJS.ProcessEnv
  /** Use this logger instead of one built from configuration. */
  audit?: AuditLogger
}

export interface Runtime {
  config: AppConfig
  renderMode: RenderMode
  audit: AuditLogger | null
  warnings: ValidationWarning[]
}

/**
 * Load configuration and fix the process-wide render mode.
 *
 * Runs once at startup, before any labeled content is rendered. Invalid
 * configuration (for example debug rendering in production) throws
 * before the render mode is touched.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<Runtime> {
  const config = await loadConfig(options.cliArgs, options.env)

  const validation = validateConfig(config)
  if (!validation.valid) {
    const [first] = validation.errors
    throw new ConfigError(
      validation.errors.map((e) => `${e.path}: ${e.message}`).join('; '),
      'invalid_config',
      first.path
    )
  }

  const audit = options.audit ?? createAuditLogger(config, options.env)
  const renderMode: RenderMode = config.rendering.debug ? 'debug' : 'protected'
  setRenderMode(renderMode)

  if (audit) {
    for (const warning of validation.warnings) {
      await audit.warning('config', 'validation_warning', {
        path: warning.path,
        message: warning.message,
      })
    }

    if (renderMode === 'debug') {
      await audit.warning('render', 'debug_rendering_enabled', {
        environment: config.environment,
      })
    } else {
      await audit.info('render', 'protected_rendering', {
        environment: config.environment,
      })
    }
  }

  return { config, renderMode, audit, warnings: validation.warnings }
}

function createAuditLogger(
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env
): AuditLogger | null {
  if (!config.logging.audit.enabled) return null

  return new AuditLogger(
    new JsonlAuditStore(config.logging.audit.dir ?? getAuditPath(env)),
    { minSeverity: config.logging.level }
  )
}
