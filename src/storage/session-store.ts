/**
 * Session and key-value contract consumed by SessionLock.
 *
 * A session is a server-tracked lease. Keys acquired under a session are
 * released (or deleted, depending on the session behavior) when the session
 * expires or is destroyed.
 */

/**
 * What happens to keys held by a session once the session goes away
 */
export type SessionBehavior = 'release' | 'delete'

export interface CreateSessionOptions {
  behavior: SessionBehavior
  /** Lease TTL in seconds. Without it the session never expires on its own. */
  ttl?: number
}

export interface SessionStore {
  /**
   * Create a session and return its id
   */
  create(options: CreateSessionOptions): Promise<string>

  /**
   * Reset the session's TTL. Returns false if the session is gone or expired.
   */
  renew(sessionId: string): Promise<boolean>

  /**
   * Destroy a session, releasing the keys it holds
   */
  destroy(sessionId: string): Promise<boolean>
}

/**
 * Conditional clause attached to a write
 */
export type LockClause = { acquire: string } | { release: string }

export interface KeyValueStore {
  /**
   * Write a value under a lock clause.
   *
   * `acquire` succeeds only if the key is unheld or already held by the same
   * session. `release` succeeds only if the key is held by that session.
   */
  put(path: string, value: string | undefined, clause: LockClause): Promise<boolean>

  /**
   * Delete a key outright
   */
  delete(path: string): Promise<boolean>
}

/**
 * A backend serving both halves of the contract
 */
export interface SessionBackend extends SessionStore, KeyValueStore {
  close?(): Promise<void>
}

export function isAcquireClause(clause: LockClause): clause is { acquire: string } {
  return 'acquire' in clause
}
