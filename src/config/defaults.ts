import type { AppConfig } from './schema.js'

/**
 * Get the default configuration.
 * Labeled content renders protected unless configuration says otherwise.
 */
export function getDefaults(): AppConfig {
  return {
    version: 1,
    environment: 'production',
    rendering: {
      debug: false,
    },
    logging: {
      level: 'info',
      audit: {
        enabled: true,
      },
    },
  }
}
