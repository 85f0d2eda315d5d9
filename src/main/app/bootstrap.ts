import { loadConfig } from '@config/app-config'
import { SystemProcessInfoProvider } from '@core/network/system-process-info-provider'
import { SqliteUsageRepository } from '@core/usage/usage-repository'
import { closeDatabase, openDatabase } from '@infra/db'
import { logger } from '@infra/logging'
import { registerProcessSignalHandlers } from './lifecycle'
import { UsageMonitor } from './usage-monitor'

let monitor: UsageMonitor | null = null
let shutdownPromise: Promise<void> | null = null

/**
 * Loads configuration, opens the database and starts monitoring. Config and
 * schema errors propagate to the caller.
 */
export async function startApp(): Promise<UsageMonitor> {
  const config = loadConfig()
  logger.info('Configuration loaded', { ...config })

  const db = openDatabase(config.dbPath)
  logger.info('Database initialized successfully')

  registerProcessSignalHandlers(shutdownApp)

  monitor = new UsageMonitor(new SqliteUsageRepository(db), new SystemProcessInfoProvider(), config)
  await monitor.start()

  return monitor
}

/** Stops sampling, flushes pending samples and closes the database. Safe to call twice. */
export function shutdownApp(): Promise<void> {
  if (!shutdownPromise) {
    shutdownPromise = (async () => {
      try {
        await monitor?.stop()
      } finally {
        monitor = null
        closeDatabase()
      }
      logger.info('Shutdown complete')
    })()
  }
  return shutdownPromise
}
