import { AppConfigSchema, type AppConfig } from './schema.js'
import { getDefaults } from './defaults.js'
import { getConfigPath, getLocalConfigPath } from './paths.js'
import { parseEnvConfig, parseCLIConfig, type CLIArgs } from './env.js'
import { fileExists, loadConfigFile } from './file.js'
import { deepMerge, type ConfigRecord } from './merge.js'
import { ConfigError } from './errors.js'

/**
 * Load configuration with full precedence chain.
 *
 * Precedence (later overrides earlier):
 * 1. Defaults
 * 2. User config file (config.json)
 * 3. Local overrides (config.local.json)
 * 4. Environment variables
 * 5. CLI arguments
 */
export async function loadConfig(
  cliArgs: CLIArgs = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  let config: ConfigRecord = getDefaults()

  const configPath = cliArgs.config ?? getConfigPath(env)
  if (await fileExists(configPath)) {
    config = deepMerge(config, await loadConfigFile(configPath))
  }

  const localPath = cliArgs.config
    ? cliArgs.config.replace(/\.json$/, '.local.json')
    : getLocalConfigPath(env)
  if (await fileExists(localPath)) {
    config = deepMerge(config, await loadConfigFile(localPath))
  }

  config = deepMerge(config, parseEnvConfig(env))
  config = deepMerge(config, parseCLIConfig(cliArgs))

  const parsed = AppConfigSchema.safeParse(config)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue.path.join('.')
    throw new ConfigError(
      `Invalid configuration at '${field}': ${issue.message}`,
      'invalid_config',
      field
    )
  }

  return parsed.data
}
