import pino from 'pino'
import type { Logger, LevelWithSilent } from 'pino'

/**
 * Observability - structured logging and lock lifecycle counters
 *
 * - Structured JSON logging via Pino, pretty output on request
 * - Child loggers per lock, bound to key and session
 * - In-memory counters for lock lifecycle events
 */

export interface Metrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void
}

export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }

  reset(): void {
    this.counters.clear()
  }
}

export interface ObservabilityOptions {
  pretty?: boolean
  level?: LevelWithSilent
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function isLogLevel(value: string | undefined): value is LevelWithSilent {
  return LOG_LEVELS.some(level => level === value)
}

/**
 * Read logger options from LEASEHOLD_LOG_LEVEL / LEASEHOLD_LOG_PRETTY
 */
export function observabilityOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ObservabilityOptions {
  const level = env.LEASEHOLD_LOG_LEVEL
  return {
    level: isLogLevel(level) ? level : undefined,
    pretty: env.LEASEHOLD_LOG_PRETTY === 'true',
  }
}

/**
 * Observability singleton - global logger and metrics
 */
export class Observability {
  private static instance: Observability | undefined

  public logger: Logger
  public metrics: InMemoryMetrics

  private constructor(options?: ObservabilityOptions) {
    this.logger = pino({
      name: 'leasehold',
      level: options?.level || 'info',
      ...(options?.pretty && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
    })

    this.metrics = new InMemoryMetrics()
  }

  static getInstance(options?: ObservabilityOptions): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability(options)
    }
    return Observability.instance
  }

  /**
   * Apply a log level from configuration. Pretty output is fixed at startup.
   */
  setLevel(level: LevelWithSilent): void {
    this.logger.level = level
  }
}

export const obs = Observability.getInstance(observabilityOptionsFromEnv())
export const logger = obs.logger
export const metrics = obs.metrics
