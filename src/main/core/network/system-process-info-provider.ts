import { readlink } from 'node:fs/promises'
import { logger } from '@infra/logging'
import { ProcessUnavailableError } from '@shared/errors'
import type {
  ActiveConnectionCount,
  ByteCounters,
  ProcessInfoProvider
} from '@shared/interfaces/common'
import { ConnectionTracker } from './connection-tracker'
import { ProcessTracker } from './process-tracker'

const MAC_BUNDLE_EXECUTABLE = /^(\/.*?\.app\/Contents\/MacOS\/[^/]+?)(?:\s+-|$)/
const MAC_BUNDLE_NAME = /\/([^/]+)\.app\//

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined
  }
  return undefined
}

/**
 * Process information backed by netstat, ps-list and procfs. The OS exposes
 * no per-process byte counters here, so getCumulativeIo always yields
 * undefined and the sampler falls back to its estimator.
 */
export class SystemProcessInfoProvider implements ProcessInfoProvider {
  constructor(
    private readonly processTracker: ProcessTracker = new ProcessTracker(),
    private readonly connectionTracker: ConnectionTracker = new ConnectionTracker(),
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async enumerateActiveConnections(): Promise<ActiveConnectionCount[]> {
    const [connections] = await Promise.all([
      this.connectionTracker.refreshConnections(),
      this.processTracker.refreshProcesses()
    ])
    return connections
  }

  async describeProcess(pid: number): Promise<{ name: string; cmdline: string }> {
    const proc = this.processTracker.getProcess(pid)
    if (!proc) {
      throw new ProcessUnavailableError(pid, 'gone')
    }
    return { name: proc.name, cmdline: proc.cmd ?? '' }
  }

  async getExecutablePath(pid: number): Promise<string | undefined> {
    if (this.platform === 'linux') {
      try {
        return await readlink(`/proc/${pid}/exe`)
      } catch (error) {
        const code = errorCode(error)
        if (code === 'ENOENT' || code === 'ESRCH') {
          throw new ProcessUnavailableError(pid, 'gone', { cause: error })
        }
        if (code === 'EACCES' || code === 'EPERM') {
          throw new ProcessUnavailableError(pid, 'access-denied', { cause: error })
        }
        throw error
      }
    }

    const cmd = this.processTracker.getProcess(pid)?.cmd
    if (!cmd?.startsWith('/')) return undefined

    const bundled = MAC_BUNDLE_EXECUTABLE.exec(cmd)
    if (bundled) return bundled[1]
    return cmd.split(/\s+/)[0]
  }

  async getCumulativeIo(_pid: number): Promise<ByteCounters | undefined> {
    return undefined
  }

  async getProductName(exePath: string): Promise<string | undefined> {
    const match = MAC_BUNDLE_NAME.exec(exePath)
    if (match) {
      logger.debug('Product name from application bundle', { exePath, productName: match[1] })
      return match[1]
    }
    return undefined
  }
}
