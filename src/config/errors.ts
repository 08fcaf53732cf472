/**
 * Error codes for configuration failures.
 */
export type ConfigErrorCode = 'invalid_config' | 'render_mode_locked'

/**
 * Error thrown when configuration cannot be loaded or applied.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}
