import type { TransportSingleOptions } from 'pino'

/** Size at which the log file rolls over, in pino-roll notation. */
export const LOG_FILE_MAX_SIZE = '10m'
/** Rolled files kept besides the active one. */
export const LOG_FILE_BACKUPS = 5

export function createTransport(
  devMode: boolean,
  logFile: string | undefined
): TransportSingleOptions | undefined {
  if (devMode) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname'
      }
    }
  }
  if (logFile) {
    return {
      target: 'pino-roll',
      options: {
        file: logFile,
        size: LOG_FILE_MAX_SIZE,
        limit: { count: LOG_FILE_BACKUPS },
        mkdir: true
      }
    }
  }
  return undefined
}
