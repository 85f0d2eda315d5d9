import { loadConfig } from '@config/app-config'
import { BACKFILL_USAGE, parseBackfillArgs, runBackfill } from '@app/backfill-runner'
import { SqliteUsageRepository } from '@core/usage/usage-repository'
import { SummaryManager } from '@core/usage/summary-manager'
import { closeDatabase, openDatabase } from '@infra/db'
import { logger } from '@infra/logging'

async function main(): Promise<number> {
  const options = parseBackfillArgs(process.argv.slice(2))
  if (!options.range && options.cleanup === undefined) {
    logger.error(BACKFILL_USAGE)
    return 2
  }

  const config = loadConfig()
  const manager = new SummaryManager(new SqliteUsageRepository(openDatabase(config.dbPath)), {
    retentionDays: config.retentionDays,
    cleanupHour: config.cleanupHour
  })

  try {
    const { failedDates, deletedSamples } = await runBackfill(manager, options)
    logger.info('Backfill finished', { failedDates, deletedSamples })
    return failedDates.length > 0 ? 1 : 0
  } finally {
    closeDatabase()
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error('Backfill failed', error)
    process.exit(1)
  })
