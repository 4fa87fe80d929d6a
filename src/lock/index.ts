export * from './errors'
export * from './lease-renewer'
export * from './session-lock'
