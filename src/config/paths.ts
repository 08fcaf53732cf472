import path from 'path'
import os from 'os'

/**
 * Get the LBSON home directory.
 * Resolution order:
 * 1. LBSON_HOME environment variable
 * 2. XDG_CONFIG_HOME/lbson (Linux)
 * 3. Platform-specific defaults
 */
export function getLbsonHome(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LBSON_HOME) {
    return env.LBSON_HOME
  }

  if (env.XDG_CONFIG_HOME) {
    return path.join(env.XDG_CONFIG_HOME, 'lbson')
  }

  switch (process.platform) {
    case 'win32':
      return path.join(env.APPDATA || '', 'lbson')
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Application Support', 'lbson')
    default:
      return path.join(os.homedir(), '.lbson')
  }
}

/**
 * Get the path to the main config file.
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getLbsonHome(env), 'config.json')
}

/**
 * Get the path to the local config overrides file.
 */
export function getLocalConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getLbsonHome(env), 'config.local.json')
}

export function getLogsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getLbsonHome(env), 'logs')
}

export function getAuditPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getLogsPath(env), 'audit')
}
