import { logger } from '@infra/logging'

export function registerProcessSignalHandlers(shutdown: () => Promise<void>): void {
  let shuttingDown = false

  const handleSignal = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      logger.warn(`Received ${signal} during shutdown, exiting immediately`)
      process.exit(1)
    }

    shuttingDown = true
    logger.info(`Received ${signal}, shutting down`)
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', error)
        process.exit(1)
      })
  }

  process.on('SIGINT', handleSignal)
  process.on('SIGTERM', handleSignal)
}
