import { shutdownApp, startApp } from '@app/bootstrap'
import { logger } from '@infra/logging'

startApp().catch((error: unknown) => {
  logger.error('Failed to bootstrap application', error)
  shutdownApp()
    .catch((shutdownError: unknown) => logger.error('Error during shutdown', shutdownError))
    .finally(() => process.exit(1))
})
