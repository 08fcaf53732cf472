import { promises as fs } from 'fs'
import { ConfigError } from './errors.js'
import { isRecord, type ConfigRecord } from './merge.js'

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Load a JSON config file. The top level must be an object.
 */
export async function loadConfigFile(filePath: string): Promise<ConfigRecord> {
  const content = await fs.readFile(filePath, 'utf-8')
  const parsed: unknown = JSON.parse(content)

  if (!isRecord(parsed)) {
    throw new ConfigError(
      `Config file '${filePath}' must contain a JSON object`,
      'invalid_config'
    )
  }

  return parsed
}
