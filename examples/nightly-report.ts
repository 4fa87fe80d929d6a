/**
 * Nightly report: run a job on exactly one of many workers
 *
 * Start several copies at once; one wins the lock, the others report that
 * the job is already running elsewhere.
 *
 *   REDIS_HOST=localhost LEASEHOLD_LOCK_TTL=30 npm run example
 */

import 'dotenv/config'
import { SessionLock } from '../src/lock'
import { LockAcquisitionFailedError } from '../src/lock/errors'
import { createSessionBackend } from '../src/storage'
import { loadConfigAuto, loadConfigFromEnv } from '../src/config'
import { logger, obs } from '../src/observability'

async function buildReport(lock: SessionLock): Promise<number> {
  logger.info({ key: lock.key, lease: lock.leaseState }, 'building report')
  await new Promise(resolve => setTimeout(resolve, 2_000))
  return 128
}

async function main(): Promise<void> {
  const config = loadConfigAuto() ?? loadConfigFromEnv()
  obs.setLevel(config.logging.level)
  const backend = createSessionBackend(config.backend)
  const lock = SessionLock.fromConfig(backend, config.lock, {
    onLeaseLost: ({ key }) => logger.error({ key }, 'lease lost while building report'),
  })

  try {
    const rows = await lock.withLock({ key: 'nightly-report', value: `pid-${process.pid}` }, buildReport)
    logger.info({ rows }, 'report finished')
  } catch (error) {
    if (error instanceof LockAcquisitionFailedError) {
      logger.info({ key: error.details.key }, 'report already running on another worker')
      return
    }
    throw error
  } finally {
    await backend.close?.()
  }
}

main().catch(error => {
  logger.error({ err: error }, 'nightly report failed')
  process.exitCode = 1
})
