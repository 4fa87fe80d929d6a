/**
 * Zod schemas for leasehold configuration
 * Validates YAML config files and environment-derived config
 */

import { z } from 'zod'

/**
 * Redis connection configuration
 */
export const RedisConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().positive().default(6379),
  password: z.string().optional(),
  db: z.number().int().min(0).default(0),
  keyPrefix: z.string().default('leasehold:'),
})

export type RedisConfig = z.infer<typeof RedisConfigSchema>

/**
 * Session/KV backend configuration
 */
export const BackendConfigSchema = z.object({
  type: z.enum(['redis', 'in-memory']).default('in-memory'),
  redis: RedisConfigSchema.optional(),
})

export type BackendConfig = z.infer<typeof BackendConfigSchema>

/**
 * Lock defaults, applied to every acquire unless overridden
 */
export const LockConfigSchema = z.object({
  prefix: z.string().default('leasehold/locks'),
  behavior: z.enum(['release', 'delete']).default('release'),
  ttl: z.number().min(10, 'ttl must be at least 10 seconds').max(86_400, 'ttl must be at most 86400 seconds').optional(),
  renewBeforeTtl: z.number().min(0).finite().default(5),
})

export type LockConfig = z.infer<typeof LockConfigSchema>

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>

export const LeaseholdConfigSchema = z.object({
  lock: LockConfigSchema.default({}),
  backend: BackendConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type LeaseholdConfig = z.infer<typeof LeaseholdConfigSchema>

/**
 * Validate and parse config with defaults
 */
export function validateConfig(config: unknown): LeaseholdConfig {
  return LeaseholdConfigSchema.parse(config ?? {})
}

/**
 * Validate config with detailed error messages
 */
export function validateConfigSafe(config: unknown): { success: true; data: LeaseholdConfig } | { success: false; errors: string[] } {
  const result = LeaseholdConfigSchema.safeParse(config ?? {})

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return path ? `${path}: ${err.message}` : err.message
  })

  return { success: false, errors }
}
