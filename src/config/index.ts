/**
 * Configuration module
 * YAML and environment config with Zod validation and defaults
 */

export * from './schema'
export * from './environment'
export * from './loader'
