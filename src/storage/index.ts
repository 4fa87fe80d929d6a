// Adapter Pattern - pluggable session/KV backends
export * from './session-store'
export * from './adapter-factory'

// Implementations
export * from './in-memory-session-store'
export * from './redis-session-store'
