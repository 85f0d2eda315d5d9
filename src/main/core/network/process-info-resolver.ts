import friendlyAppNames from '@config/friendly-app-names.json'
import { logger } from '@infra/logging'
import { ProcessUnavailableError } from '@shared/errors'
import type { ProcessInfo, ProcessInfoProvider } from '@shared/interfaces/common'

const FRIENDLY_APP_NAMES = new Map<string, string>(Object.entries(friendlyAppNames))

const EXECUTABLE_EXTENSION = /\.(exe|app)$/i

/** Drops a trailing .exe/.app and upper-cases the first letter. */
export function cleanProcessName(processName: string): string {
  const stripped = processName.replace(EXECUTABLE_EXTENSION, '')
  if (!stripped) return stripped
  return stripped[0].toUpperCase() + stripped.slice(1)
}

/** Friendly-name table entry for a process, falling back to its cleaned name. */
export function friendlyAppName(processName: string): string {
  const key = processName.replace(EXECUTABLE_EXTENSION, '').toLowerCase()
  return FRIENDLY_APP_NAMES.get(key) ?? cleanProcessName(processName)
}

function degradedInfo(pid: number, label: 'Unknown' | 'Error'): ProcessInfo {
  return { pid, processName: label, appName: label, cmdline: '' }
}

/**
 * Maps pids to process and application names. Successful lookups are
 * memoized until invalidated; degraded results are returned but never cached.
 */
export class ProcessInfoResolver {
  private readonly cache = new Map<number, ProcessInfo>()

  constructor(private readonly provider: ProcessInfoProvider) {}

  async resolve(pid: number): Promise<ProcessInfo> {
    const cached = this.cache.get(pid)
    if (cached) return cached

    try {
      const { name, cmdline } = await this.provider.describeProcess(pid)
      const info: ProcessInfo = Object.freeze({
        pid,
        processName: name,
        appName: await this.resolveAppName(pid, name),
        cmdline
      })
      this.cache.set(pid, info)
      return info
    } catch (error) {
      if (error instanceof ProcessUnavailableError && error.reason === 'gone') {
        return degradedInfo(pid, 'Unknown')
      }
      logger.error(`Error getting process info for PID ${pid}`, error)
      return degradedInfo(pid, 'Error')
    }
  }

  invalidate(pid: number): void {
    this.cache.delete(pid)
  }

  clear(): void {
    this.cache.clear()
  }

  get size(): number {
    return this.cache.size
  }

  private async resolveAppName(pid: number, processName: string): Promise<string> {
    let exePath: string | undefined
    try {
      exePath = await this.provider.getExecutablePath(pid)
    } catch (error) {
      logger.debug(`Executable path unavailable for PID ${pid}`, error)
    }

    if (exePath) {
      try {
        const productName = (await this.provider.getProductName(exePath))?.trim()
        if (productName) return productName
      } catch (error) {
        logger.debug(`Could not read product name from ${exePath}`, error)
      }
    }

    return friendlyAppName(processName)
  }
}
