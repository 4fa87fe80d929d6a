export class InvalidParameterError extends Error {
  public readonly details: {
    parameter: string
    value: unknown
  }

  constructor(message: string, details: InvalidParameterError['details']) {
    super(message)
    this.name = 'InvalidParameterError'
    this.details = details
  }
}

/**
 * The conditional write did not win the key. No resources are held;
 * safe to retry.
 */
export class LockAcquisitionFailedError extends Error {
  public readonly details: {
    key: string
  }

  constructor(message: string, details: LockAcquisitionFailedError['details'], options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LockAcquisitionFailedError'
    this.details = details
  }
}

export class LockAlreadyHeldError extends Error {
  public readonly details: {
    key: string
  }

  constructor(key: string) {
    super(`Lock handle already holds ${key}; release it before acquiring again`)
    this.name = 'LockAlreadyHeldError'
    this.details = { key }
  }
}

/**
 * One or more cleanup steps of a release failed. Every step was still attempted.
 */
export class LockReleaseError extends Error {
  public readonly errors: Error[]
  public readonly details: {
    key: string
    sessionId: string
  }

  constructor(errors: Error[], details: LockReleaseError['details']) {
    super(`Failed to release ${details.key}: ${errors.map(e => e.message).join('; ')}`)
    this.name = 'LockReleaseError'
    this.errors = errors
    this.details = details
  }
}
