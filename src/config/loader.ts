/**
 * YAML configuration loader with type-safe parsing
 */

import { readFileSync, existsSync } from 'fs'
import { resolve } from 'path'
import * as yaml from 'js-yaml'
import { validateConfigSafe, type LeaseholdConfig } from './schema'
import { ConfigurationError } from './environment'

export const DEFAULT_CONFIG_PATHS = [
  'leasehold.config.yaml',
  'leasehold.config.yml',
  '.leasehold.yaml',
  '.leasehold.yml',
  'config/leasehold.yaml',
]

/**
 * Load and validate config from YAML file
 * @throws ConfigurationError if the file is missing, unparsable or invalid
 */
export function loadConfig(filePath: string): LeaseholdConfig {
  const result = loadConfigSafe(filePath)
  if (!result.success) {
    throw new ConfigurationError(
      `Failed to load config from ${filePath}:\n  - ${result.errors.join('\n  - ')}`,
      { errors: result.errors, searchedPaths: [resolve(filePath)] }
    )
  }
  return result.data
}

/**
 * Load config with detailed error reporting
 */
export function loadConfigSafe(filePath: string): { success: true; data: LeaseholdConfig } | { success: false; errors: string[] } {
  const absolutePath = resolve(filePath)

  if (!existsSync(absolutePath)) {
    return {
      success: false,
      errors: [`Config file not found: ${absolutePath}`],
    }
  }

  let rawConfig: unknown
  try {
    rawConfig = yaml.load(readFileSync(absolutePath, 'utf-8'))
  } catch (error) {
    return {
      success: false,
      errors: [`Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`],
    }
  }

  return validateConfigSafe(rawConfig)
}

/**
 * Load config from LEASEHOLD_CONFIG_PATH or the first default path that exists
 */
export function loadConfigAuto(
  env: NodeJS.ProcessEnv = process.env,
  searchPaths: string[] = DEFAULT_CONFIG_PATHS
): LeaseholdConfig | undefined {
  if (env.LEASEHOLD_CONFIG_PATH) {
    return loadConfig(env.LEASEHOLD_CONFIG_PATH)
  }

  const found = searchPaths.find(path => existsSync(path))
  return found ? loadConfig(found) : undefined
}
