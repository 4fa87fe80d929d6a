import { v4 as uuidv4 } from 'uuid'
import { logger } from '../observability'
import { isAcquireClause } from './session-store'
import type { CreateSessionOptions, LockClause, SessionBackend, SessionBehavior } from './session-store'

interface SessionRecord {
  id: string
  behavior: SessionBehavior
  ttlMs?: number
  expiresAt?: number
}

interface KeyRecord {
  value: string | undefined
  session?: string
}

export interface InMemorySessionStoreOptions {
  /** Clock in milliseconds, injectable for tests */
  now?: () => number
  generateId?: () => string
}

/**
 * InMemorySessionStore - single-process session/KV store for tests and local development.
 * Session leases expire against the injected clock.
 * DO NOT use in production with multiple processes.
 */
export class InMemorySessionStore implements SessionBackend {
  private sessions = new Map<string, SessionRecord>()
  private keys = new Map<string, KeyRecord>()
  private now: () => number
  private generateId: () => string

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.now = options.now ?? (() => Date.now())
    this.generateId = options.generateId ?? uuidv4

    if (process.env.NODE_ENV === 'production') {
      logger.warn(
        { component: 'InMemorySessionStore' },
        'Using in-memory session store in production. Use RedisSessionStore for distributed locking.'
      )
    }
  }

  async create(options: CreateSessionOptions): Promise<string> {
    this.expireSessions()

    const record: SessionRecord = { id: this.generateId(), behavior: options.behavior }
    if (options.ttl !== undefined) {
      record.ttlMs = options.ttl * 1000
      record.expiresAt = this.now() + record.ttlMs
    }

    this.sessions.set(record.id, record)
    return record.id
  }

  async renew(sessionId: string): Promise<boolean> {
    this.expireSessions()

    const session = this.sessions.get(sessionId)
    if (!session) return false

    if (session.ttlMs !== undefined) {
      session.expiresAt = this.now() + session.ttlMs
    }
    return true
  }

  async destroy(sessionId: string): Promise<boolean> {
    this.expireSessions()

    const session = this.sessions.get(sessionId)
    if (!session) return false

    this.invalidate(session)
    return true
  }

  async put(path: string, value: string | undefined, clause: LockClause): Promise<boolean> {
    this.expireSessions()
    const existing = this.keys.get(path)

    if (isAcquireClause(clause)) {
      if (!this.sessions.has(clause.acquire)) return false
      if (existing?.session && existing.session !== clause.acquire) return false

      this.keys.set(path, { value, session: clause.acquire })
      return true
    }

    if (!existing || existing.session !== clause.release) return false
    this.keys.set(path, { value })
    return true
  }

  async delete(path: string): Promise<boolean> {
    this.expireSessions()
    return this.keys.delete(path)
  }

  // Inspection helpers for tests

  holderOf(path: string): string | undefined {
    this.expireSessions()
    return this.keys.get(path)?.session
  }

  valueOf(path: string): string | undefined {
    this.expireSessions()
    return this.keys.get(path)?.value
  }

  hasKey(path: string): boolean {
    this.expireSessions()
    return this.keys.has(path)
  }

  get sessionCount(): number {
    this.expireSessions()
    return this.sessions.size
  }

  clear(): void {
    this.sessions.clear()
    this.keys.clear()
  }

  private expireSessions(): void {
    const now = this.now()
    for (const session of [...this.sessions.values()]) {
      if (session.expiresAt !== undefined && session.expiresAt <= now) {
        this.invalidate(session)
      }
    }
  }

  private invalidate(session: SessionRecord): void {
    this.sessions.delete(session.id)

    for (const [path, record] of this.keys) {
      if (record.session !== session.id) continue
      if (session.behavior === 'delete') {
        this.keys.delete(path)
      } else {
        this.keys.set(path, { value: record.value })
      }
    }
  }
}
