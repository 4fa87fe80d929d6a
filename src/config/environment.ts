/**
 * Environment Configuration with Validation
 *
 * Reads LEASEHOLD_* and REDIS_* variables into a validated LeaseholdConfig.
 */

import { validateConfigSafe } from './schema'
import type { LeaseholdConfig } from './schema'

export class ConfigurationError extends Error {
  public readonly details?: {
    key?: string
    errors?: string[]
    searchedPaths?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

function parseNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw === '') return undefined

  const value = Number(raw)
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`, { key })
  }
  return value
}

/**
 * Load Redis connection settings from environment, or undefined when REDIS_HOST is unset
 */
export function loadRedisConfig(env: NodeJS.ProcessEnv = process.env) {
  if (!env.REDIS_HOST) return undefined

  return {
    host: env.REDIS_HOST,
    port: parseNumber(env, 'REDIS_PORT'),
    password: env.REDIS_PASSWORD || undefined,
    db: parseNumber(env, 'REDIS_DB'),
    keyPrefix: env.LEASEHOLD_REDIS_KEY_PREFIX || undefined,
  }
}

/**
 * Load the full configuration from environment variables.
 *
 * LEASEHOLD_BACKEND defaults to "redis" when REDIS_HOST is set, otherwise "in-memory".
 * @throws ConfigurationError when a value is malformed or fails validation
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LeaseholdConfig {
  const redis = loadRedisConfig(env)

  const raw = {
    lock: {
      prefix: env.LEASEHOLD_LOCK_PREFIX,
      behavior: env.LEASEHOLD_LOCK_BEHAVIOR || undefined,
      ttl: parseNumber(env, 'LEASEHOLD_LOCK_TTL'),
      renewBeforeTtl: parseNumber(env, 'LEASEHOLD_RENEW_BEFORE_TTL'),
    },
    backend: {
      type: env.LEASEHOLD_BACKEND || (redis ? 'redis' : undefined),
      redis,
    },
    logging: {
      level: env.LEASEHOLD_LOG_LEVEL || undefined,
    },
  }

  const result = validateConfigSafe(raw)
  if (!result.success) {
    throw new ConfigurationError(
      `Configuration validation failed:\n  - ${result.errors.join('\n  - ')}`,
      { errors: result.errors }
    )
  }
  return result.data
}
