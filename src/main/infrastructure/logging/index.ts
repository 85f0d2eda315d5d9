import pino from 'pino'
import { isDevelopment } from '@shared/utils/environment'
import { createTransport } from './transport'

const isDevMode = isDevelopment()
const logFile = process.env.NETMETER_LOG_FILE

const pinoLogger = pino({
  level: process.env.NETMETER_LOG_LEVEL ?? (isDevMode ? 'debug' : 'info'),
  transport: createTransport(isDevMode, logFile),
  formatters: {
    level: (label) => {
      return { level: label }
    }
  },
  base: {
    pid: process.pid,
    app: 'NetMeter'
  }
})

// Supports both: logger.info(msg, obj) and logger.info(obj, msg)
function createLogMethod(level: 'info' | 'warn' | 'error' | 'debug') {
  return (msgOrObj: string | object, objOrMsg?: object | string | unknown): void => {
    if (typeof msgOrObj === 'string') {
      if (objOrMsg !== undefined) {
        if (objOrMsg instanceof Error) {
          pinoLogger[level]({ err: objOrMsg }, msgOrObj)
        } else if (typeof objOrMsg === 'object' && objOrMsg !== null) {
          pinoLogger[level](objOrMsg, msgOrObj)
        } else {
          pinoLogger[level]({ data: objOrMsg }, msgOrObj)
        }
      } else {
        pinoLogger[level](msgOrObj)
      }
    } else {
      if (objOrMsg && typeof objOrMsg === 'string') {
        pinoLogger[level](msgOrObj, objOrMsg)
      } else {
        pinoLogger[level](msgOrObj)
      }
    }
  }
}

export const logger = {
  info: createLogMethod('info'),
  warn: createLogMethod('warn'),
  error: createLogMethod('error'),
  debug: createLogMethod('debug'),
  child: pinoLogger.child.bind(pinoLogger)
}

export type Logger = typeof logger

if (!isDevMode && logFile) {
  logger.info('Logging to file', { logFile })
}
