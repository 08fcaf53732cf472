import type { AppConfig, Environment } from './schema.js'

export interface ValidationError {
  path: string
  message: string
  suggestion?: string
}

export interface ValidationWarning {
  path: string
  message: string
}

export interface ValidationResult {
  valid: boolean
  errors: ValidationError[]
  warnings: ValidationWarning[]
}

/**
 * Environments allowed to render labeled payloads for diagnostics.
 */
export const DEBUG_RENDERING_ENVIRONMENTS: readonly Environment[] = [
  'development',
  'test',
]

/**
 * Validate a configuration for semantic correctness.
 * This goes beyond Zod schema validation to check which builds may
 * expose labeled content.
 */
export function validateConfig(config: AppConfig): ValidationResult {
  const errors: ValidationError[] = []
  const warnings: ValidationWarning[] = []

  if (
    config.rendering.debug &&
    !DEBUG_RENDERING_ENVIRONMENTS.includes(config.environment)
  ) {
    errors.push({
      path: 'rendering.debug',
      message: `Debug rendering is not permitted in the '${config.environment}' environment`,
      suggestion: 'Unset LBSON_RENDERING_DEBUG or set LBSON_ENVIRONMENT=development',
    })
  }

  if (config.rendering.debug && !config.logging.audit.enabled) {
    warnings.push({
      path: 'logging.audit.enabled',
      message: 'Debug rendering is enabled without an audit trail',
    })
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  }
}
