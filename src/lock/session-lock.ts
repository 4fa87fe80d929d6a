import type { Logger } from 'pino'
import { v4 as uuidv4 } from 'uuid'
import type { KeyValueStore, SessionBehavior, SessionStore } from '../storage/session-store'
import type { LockConfig } from '../config/schema'
import { logger as rootLogger, metrics } from '../observability'
import { LeaseRenewer } from './lease-renewer'
import type { LeaseLostInfo } from './lease-renewer'
import {
  InvalidParameterError,
  LockAcquisitionFailedError,
  LockAlreadyHeldError,
  LockReleaseError,
} from './errors'

export const DEFAULT_PREFIX = 'leasehold/locks'
export const MIN_LEASE_TTL_SECONDS = 10
export const MAX_LEASE_TTL_SECONDS = 86_400
export const DEFAULT_RENEW_BEFORE_TTL = 5

export interface AcquireOptions {
  /** Key to lock; a fresh token when omitted */
  key?: string
  /** Payload stored alongside the lock marker */
  value?: string
  behavior?: SessionBehavior
  /** Lease TTL in seconds, between MIN_LEASE_TTL_SECONDS and MAX_LEASE_TTL_SECONDS */
  ttl?: number
  /** Seconds subtracted from ttl to get the renewal cadence */
  renewBeforeTtl?: number
}

export type LeaseState = 'unheld' | 'held' | 'renewing' | 'degraded'

export interface SessionLockOptions {
  prefix?: string
  /** Defaults applied to every acquire unless overridden */
  defaults?: Omit<AcquireOptions, 'key' | 'value'>
  generateToken?: () => string
  logger?: Logger
  onLeaseLost?: (info: LeaseLostInfo & { key: string }) => void
}

interface HeldLock {
  key: string
  sessionId: string
  renewer?: LeaseRenewer
  log: Logger
}

/**
 * SessionLock - exclusive lock on a key of a session-aware KV store
 *
 * Each acquisition creates a session, writes the key with an acquire clause
 * bound to it and, for TTL leases, keeps the session alive in the background.
 * Release tears all of it down. A handle is reusable but holds at most one
 * lock at a time.
 *
 * @example
 * ```ts
 * const lock = new SessionLock(new InMemorySessionStore())
 * await lock.withLock({ key: 'nightly-report', ttl: 30 }, async () => {
 *   // only one process runs this at a time
 * })
 * ```
 */
export class SessionLock {
  private _prefix: string
  private held: HeldLock | undefined
  private generateToken: () => string
  private log: Logger

  constructor(
    private backend: SessionStore & KeyValueStore,
    private options: SessionLockOptions = {}
  ) {
    this._prefix = options.prefix ?? DEFAULT_PREFIX
    this.generateToken = options.generateToken ?? uuidv4
    this.log = (options.logger ?? rootLogger).child({ component: 'SessionLock' })
  }

  /**
   * Build a lock whose prefix and acquire defaults come from configuration
   */
  static fromConfig(
    backend: SessionStore & KeyValueStore,
    config: LockConfig,
    options: Omit<SessionLockOptions, 'prefix' | 'defaults'> = {}
  ): SessionLock {
    return new SessionLock(backend, {
      ...options,
      prefix: config.prefix,
      defaults: {
        behavior: config.behavior,
        ttl: config.ttl,
        renewBeforeTtl: config.renewBeforeTtl,
      },
    })
  }

  /**
   * The held key path, undefined while unheld
   */
  get key(): string | undefined {
    return this.held?.key
  }

  get sessionId(): string | undefined {
    return this.held?.sessionId
  }

  get isHeld(): boolean {
    return this.held !== undefined
  }

  get leaseState(): LeaseState {
    if (!this.held) return 'unheld'
    const renewer = this.held.renewer
    if (!renewer) return 'held'
    return renewer.status === 'degraded' ? 'degraded' : 'renewing'
  }

  /**
   * Set the key namespace for the next acquire
   */
  prefix(value: string | null | undefined): void {
    this._prefix = value || ''
  }

  async acquire(options: AcquireOptions = {}): Promise<void> {
    if (this.held) {
      throw new LockAlreadyHeldError(this.held.key)
    }

    const defaults = this.options.defaults ?? {}
    const behavior = options.behavior ?? defaults.behavior ?? 'release'
    const ttl = options.ttl ?? defaults.ttl
    const renewBeforeTtl = options.renewBeforeTtl ?? defaults.renewBeforeTtl ?? DEFAULT_RENEW_BEFORE_TTL

    if (ttl !== undefined && !(ttl >= MIN_LEASE_TTL_SECONDS)) {
      throw new InvalidParameterError(
        `ttl is less than the minimum (${MIN_LEASE_TTL_SECONDS}s)`,
        { parameter: 'ttl', value: ttl }
      )
    }
    if (ttl !== undefined && !(ttl <= MAX_LEASE_TTL_SECONDS)) {
      throw new InvalidParameterError(
        `ttl is more than the maximum (${MAX_LEASE_TTL_SECONDS}s)`,
        { parameter: 'ttl', value: ttl }
      )
    }
    if (!(renewBeforeTtl >= 0) || !Number.isFinite(renewBeforeTtl)) {
      throw new InvalidParameterError('renewBeforeTtl must be a finite number of seconds, zero or more', {
        parameter: 'renewBeforeTtl',
        value: renewBeforeTtl,
      })
    }

    const key = [this._prefix, options.key || this.generateToken()].join('/')

    let sessionId: string
    try {
      sessionId = await this.backend.create(ttl === undefined ? { behavior } : { behavior, ttl })
    } catch (error) {
      metrics.increment('lock.acquire_failed')
      throw new LockAcquisitionFailedError(`Could not create a session for ${key}`, { key }, { cause: error })
    }
    if (!sessionId) {
      metrics.increment('lock.acquire_failed')
      throw new LockAcquisitionFailedError(`Store returned no session for ${key}`, { key })
    }

    const log = this.log.child({ key, sessionId })
    log.debug('acquiring lock')

    let acquired = false
    let writeError: unknown
    try {
      acquired = await this.backend.put(key, options.value, { acquire: sessionId })
    } catch (error) {
      writeError = error
    }

    if (!acquired) {
      try {
        await this.backend.destroy(sessionId)
      } catch (destroyError) {
        log.warn({ err: destroyError }, 'failed to destroy session after losing the lock')
      }
      metrics.increment('lock.acquire_failed')
      throw new LockAcquisitionFailedError(
        writeError === undefined ? `Lock ${key} is held by another session` : `Lock write for ${key} failed`,
        { key },
        writeError === undefined ? undefined : { cause: writeError }
      )
    }

    const held: HeldLock = { key, sessionId, log }
    this.held = held
    metrics.increment('lock.acquired')

    if (ttl !== undefined) {
      const intervalSeconds = ttl - renewBeforeTtl
      if (intervalSeconds > 0) {
        const renewer = new LeaseRenewer({
          sessions: this.backend,
          sessionId,
          intervalSeconds,
          logger: log,
          onLeaseLost: info => this.options.onLeaseLost?.({ ...info, key }),
        })
        held.renewer = renewer
        renewer.start()
      } else {
        log.debug({ ttl, renewBeforeTtl }, 'no renewal; session expires at ttl')
      }
    }
  }

  /**
   * Release the key and destroy the session. Every cleanup step runs even if
   * an earlier one fails; failures surface together as a LockReleaseError.
   * Releasing an unheld handle does nothing.
   */
  async release(): Promise<void> {
    const held = this.held
    if (!held) {
      this.log.debug('release on an unheld lock; nothing to do')
      return
    }

    const { key, sessionId, renewer, log } = held
    const renewerStopped = renewer?.stop() ?? Promise.resolve()
    const errors: Error[] = []

    const step = async (name: string, operation: () => Promise<boolean>) => {
      try {
        if (!(await operation())) {
          log.warn({ step: name }, 'store rejected release step')
        }
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)))
        log.warn({ err: error, step: name }, 'release step failed')
      }
    }

    await step('release', () => this.backend.put(key, undefined, { release: sessionId }))
    await step('delete', () => this.backend.delete(key))
    await step('destroy', () => this.backend.destroy(sessionId))
    await renewerStopped

    this.held = undefined

    if (errors.length > 0) {
      metrics.increment('lock.release_failed')
      throw new LockReleaseError(errors, { key, sessionId })
    }
    metrics.increment('lock.released')
    log.debug('released lock')
  }

  /**
   * Run `criticalSection` while holding the lock. The lock is released on
   * every exit path; if the section throws, its error wins over a release error.
   */
  async withLock<T>(
    options: AcquireOptions,
    criticalSection: (lock: SessionLock) => Promise<T> | T
  ): Promise<T> {
    await this.acquire(options)

    let result: T
    try {
      result = await criticalSection(this)
    } catch (error) {
      try {
        await this.release()
      } catch (releaseError) {
        this.log.error({ err: releaseError }, 'release after a failed critical section also failed')
      }
      throw error
    }

    await this.release()
    return result
  }
}
