/**
 * Adapter Factory - Configuration-based backend instantiation
 *
 * Enables selecting the session/KV backend via configuration without code changes.
 */

import Redis from 'ioredis'
import { RedisConfigSchema } from '../config/schema'
import type { BackendConfig, RedisConfig } from '../config/schema'
import { ConfigurationError } from '../config/environment'
import { logger } from '../observability'
import type { SessionBackend } from './session-store'
import { InMemorySessionStore } from './in-memory-session-store'
import { RedisSessionStore } from './redis-session-store'

export class AdapterFactory {
  /**
   * Create the session/KV backend. In-memory when no config is given.
   */
  static createSessionBackend(config?: BackendConfig): SessionBackend {
    if (!config || config.type === 'in-memory') {
      return new InMemorySessionStore()
    }

    if (config.type === 'redis') {
      const redisConfig: RedisConfig = config.redis ?? RedisConfigSchema.parse({})
      logger.debug(
        { component: 'AdapterFactory', host: redisConfig.host, port: redisConfig.port },
        'creating Redis session backend'
      )

      const redis = new Redis({
        host: redisConfig.host,
        port: redisConfig.port,
        password: redisConfig.password,
        db: redisConfig.db,
      })
      return new RedisSessionStore({ redis, keyPrefix: redisConfig.keyPrefix })
    }

    throw new ConfigurationError(`Unknown session backend type: ${String(config.type)}`, { key: 'backend.type' })
  }
}

export function createSessionBackend(config?: BackendConfig): SessionBackend {
  return AdapterFactory.createSessionBackend(config)
}
