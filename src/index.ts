// Core exports
export * from './lock'
export * from './storage'

// Configuration exports
export * from './config'

// Observability exports
export { logger, metrics, obs, Observability, InMemoryMetrics, observabilityOptionsFromEnv } from './observability'
export type { Metrics, ObservabilityOptions } from './observability'
