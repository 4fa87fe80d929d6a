/**
 * Redis-backed session/KV store
 *
 * Key Structure:
 * - {prefix}session:{sessionId} -> Hash { behavior, ttl } with PEXPIRE = ttl
 * - {prefix}session:{sessionId}:keys -> Set of lock keys held by the session
 * - {prefix}kv:{path} -> Hash { value, session }
 *
 * Conditional writes run as Lua scripts so the holder check and the write
 * are atomic. A key whose holder session has expired counts as free on the
 * next acquire.
 *
 * Single instance only: the scripts reach keys they do not declare (a
 * session's held lock keys, the holder of a contested key), which Redis
 * Cluster rejects when those keys live in another slot.
 */

import type Redis from 'ioredis'
import { v4 as uuidv4 } from 'uuid'
import { isAcquireClause } from './session-store'
import type { CreateSessionOptions, LockClause, SessionBackend } from './session-store'

const CREATE_SESSION = `
redis.call('HSET', KEYS[1], 'behavior', ARGV[1], 'ttl', ARGV[2])
if tonumber(ARGV[2]) > 0 then redis.call('PEXPIRE', KEYS[1], ARGV[2]) end
return 1
`

const RENEW_SESSION = `
local ttl = redis.call('HGET', KEYS[1], 'ttl')
if not ttl then return 0 end
if tonumber(ttl) > 0 then
  redis.call('PEXPIRE', KEYS[1], ttl)
  if redis.call('EXISTS', KEYS[2]) == 1 then redis.call('PEXPIRE', KEYS[2], ttl) end
end
return 1
`

const DESTROY_SESSION = `
local behavior = redis.call('HGET', KEYS[1], 'behavior')
if not behavior then
  redis.call('DEL', KEYS[2])
  return 0
end
for _, kv in ipairs(redis.call('SMEMBERS', KEYS[2])) do
  if redis.call('HGET', kv, 'session') == ARGV[1] then
    if behavior == 'delete' then redis.call('DEL', kv) else redis.call('HDEL', kv, 'session') end
  end
end
redis.call('DEL', KEYS[1], KEYS[2])
return 1
`

const ACQUIRE_KEY = `
if redis.call('EXISTS', KEYS[2]) == 0 then return 0 end
local holder = redis.call('HGET', KEYS[1], 'session')
if holder and holder ~= ARGV[1] then
  if redis.call('EXISTS', ARGV[3] .. holder) == 1 then return 0 end
end
redis.call('HSET', KEYS[1], 'value', ARGV[2], 'session', ARGV[1])
redis.call('SADD', KEYS[3], KEYS[1])
local pttl = redis.call('PTTL', KEYS[2])
if pttl > 0 then redis.call('PEXPIRE', KEYS[3], pttl) end
return 1
`

const RELEASE_KEY = `
if redis.call('HGET', KEYS[1], 'session') ~= ARGV[1] then return 0 end
redis.call('HSET', KEYS[1], 'value', ARGV[2])
redis.call('HDEL', KEYS[1], 'session')
redis.call('SREM', KEYS[2], KEYS[1])
return 1
`

export interface RedisSessionStoreOptions {
  /** Redis client instance */
  redis: Redis

  /** Prefix for all Redis keys - default: 'leasehold:' */
  keyPrefix?: string

  generateId?: () => string
}

export class RedisSessionStore implements SessionBackend {
  private redis: Redis
  private keyPrefix: string
  private generateId: () => string

  constructor(options: RedisSessionStoreOptions) {
    this.redis = options.redis
    this.keyPrefix = options.keyPrefix ?? 'leasehold:'
    this.generateId = options.generateId ?? uuidv4
  }

  // ========================================================================
  // Key Generators
  // ========================================================================

  private sessionPrefix(): string {
    return `${this.keyPrefix}session:`
  }

  private sessionKey(sessionId: string): string {
    return `${this.sessionPrefix()}${sessionId}`
  }

  private heldKeysKey(sessionId: string): string {
    return `${this.sessionKey(sessionId)}:keys`
  }

  private kvKey(path: string): string {
    return `${this.keyPrefix}kv:${path}`
  }

  // ========================================================================
  // SessionBackend Implementation
  // ========================================================================

  async create(options: CreateSessionOptions): Promise<string> {
    const sessionId = this.generateId()
    const ttlMs = options.ttl === undefined ? 0 : Math.round(options.ttl * 1000)

    await this.redis.eval(CREATE_SESSION, 1, this.sessionKey(sessionId), options.behavior, ttlMs)
    return sessionId
  }

  async renew(sessionId: string): Promise<boolean> {
    const result = await this.redis.eval(
      RENEW_SESSION,
      2,
      this.sessionKey(sessionId),
      this.heldKeysKey(sessionId)
    )
    return result === 1
  }

  async destroy(sessionId: string): Promise<boolean> {
    const result = await this.redis.eval(
      DESTROY_SESSION,
      2,
      this.sessionKey(sessionId),
      this.heldKeysKey(sessionId),
      sessionId
    )
    return result === 1
  }

  async put(path: string, value: string | undefined, clause: LockClause): Promise<boolean> {
    if (isAcquireClause(clause)) {
      const result = await this.redis.eval(
        ACQUIRE_KEY,
        3,
        this.kvKey(path),
        this.sessionKey(clause.acquire),
        this.heldKeysKey(clause.acquire),
        clause.acquire,
        value ?? '',
        this.sessionPrefix()
      )
      return result === 1
    }

    const result = await this.redis.eval(
      RELEASE_KEY,
      2,
      this.kvKey(path),
      this.heldKeysKey(clause.release),
      clause.release,
      value ?? ''
    )
    return result === 1
  }

  async delete(path: string): Promise<boolean> {
    const removed = await this.redis.del(this.kvKey(path))
    return removed > 0
  }

  async close(): Promise<void> {
    await this.redis.quit()
  }
}
