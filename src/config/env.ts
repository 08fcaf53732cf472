import { setPath, type ConfigRecord } from './merge.js'
import type { AuditSeverity } from '../audit/types.js'
import type { Environment } from './schema.js'

const ENV_PREFIX = 'LBSON_'

// Reserved environment variables (not parsed into config)
const RESERVED_ENV_VARS = new Set(['LBSON_HOME'])

/**
 * Parse environment variables into a partial config object.
 *
 * Naming conventions:
 * - LBSON_ENVIRONMENT -> environment
 * - LBSON_RENDERING_DEBUG -> rendering.debug
 * - LBSON_LOGGING_AUDIT__ENABLED -> logging.audit.enabled
 *
 * Single and double underscores both separate path segments.
 */
export function parseEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): ConfigRecord {
  const config: ConfigRecord = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX)) continue
    if (value === undefined) continue
    if (RESERVED_ENV_VARS.has(key)) continue

    const path = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, '.')
      .replace(/_/g, '.')

    setPath(config, path, parseValue(value))
  }

  return config
}

/**
 * Parse a string value to its appropriate type.
 */
export function parseValue(value: string): unknown {
  if (value === 'true') return true
  if (value === 'false') return false

  if (/^-?\d+$/.test(value)) return parseInt(value, 10)
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value)

  return value
}

export interface CLIArgs {
  config?: string
  environment?: Environment
  debug?: boolean
  logLevel?: AuditSeverity
}

/**
 * Parse CLI arguments into a partial config object.
 */
export function parseCLIConfig(args: CLIArgs): ConfigRecord {
  const config: ConfigRecord = {}

  if (args.environment !== undefined) {
    setPath(config, 'environment', args.environment)
  }

  if (args.debug !== undefined) {
    setPath(config, 'rendering.debug', args.debug)
  }

  if (args.logLevel !== undefined) {
    setPath(config, 'logging.level', args.logLevel)
  }

  return config
}
