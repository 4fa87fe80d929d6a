import type { Logger } from 'pino'
import type { SessionStore } from '../storage/session-store'
import { logger as rootLogger, metrics } from '../observability'

export type RenewerStatus = 'running' | 'stopped' | 'degraded'

export interface LeaseLostInfo {
  sessionId: string
  renewals: number
  error?: unknown
}

export interface LeaseRenewerOptions {
  sessions: SessionStore
  sessionId: string
  intervalSeconds: number
  logger?: Logger
  onLeaseLost?: (info: LeaseLostInfo) => void
}

/** Longest delay setTimeout honours; larger values fire after 1 ms */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1

/**
 * Sleep that resolves early when the signal aborts. Delays beyond
 * MAX_TIMER_DELAY_MS are waited out in consecutive timers.
 */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve()

  return new Promise(resolve => {
    let timer: ReturnType<typeof setTimeout> | undefined
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const schedule = (remaining: number) => {
      const delay = Math.min(remaining, MAX_TIMER_DELAY_MS)
      timer = setTimeout(() => {
        if (remaining > delay) {
          schedule(remaining - delay)
          return
        }
        signal.removeEventListener('abort', onAbort)
        resolve()
      }, delay)
    }
    signal.addEventListener('abort', onAbort, { once: true })
    schedule(ms)
  })
}

/**
 * LeaseRenewer - keeps one session alive while its lock is held
 *
 * Renews immediately, then every `intervalSeconds`. A failed renewal ends
 * the loop: the lease may now expire under the holder, which is reported
 * through the status, a warning and `onLeaseLost`, never thrown.
 */
export class LeaseRenewer {
  private controller = new AbortController()
  private loop: Promise<void> | undefined
  private _status: RenewerStatus = 'stopped'
  private _renewals = 0
  private log: Logger

  constructor(private options: LeaseRenewerOptions) {
    this.log = (options.logger ?? rootLogger).child({
      component: 'LeaseRenewer',
      sessionId: options.sessionId,
    })
  }

  get status(): RenewerStatus {
    return this._status
  }

  get renewals(): number {
    return this._renewals
  }

  start(): void {
    if (this.loop) return
    this._status = 'running'
    this.loop = this.run(this.controller.signal)
  }

  /**
   * Signal the loop to stop. Resolves once an in-flight renew (if any) has returned.
   */
  stop(): Promise<void> {
    this.controller.abort()
    return this.loop ?? Promise.resolve()
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { sessions, sessionId, intervalSeconds } = this.options

    while (!signal.aborted) {
      this.log.debug({ intervalSeconds }, 'renewing session')

      let renewed = false
      let failure: unknown
      try {
        renewed = await sessions.renew(sessionId)
      } catch (error) {
        failure = error
      }

      if (!renewed) {
        if (signal.aborted) break
        this.degrade(failure)
        return
      }

      this._renewals++
      metrics.increment('lease.renewed')
      await abortableSleep(intervalSeconds * 1000, signal)
    }

    this._status = 'stopped'
    this.log.debug({ renewals: this._renewals }, 'ceasing renewal')
  }

  private degrade(error: unknown): void {
    this._status = 'degraded'
    metrics.increment('lease.degraded')
    this.log.warn({ err: error, renewals: this._renewals }, 'session renewal failed; lease may expire')

    try {
      this.options.onLeaseLost?.({ sessionId: this.options.sessionId, renewals: this._renewals, error })
    } catch (callbackError) {
      this.log.error({ err: callbackError }, 'onLeaseLost callback threw')
    }
  }
}
