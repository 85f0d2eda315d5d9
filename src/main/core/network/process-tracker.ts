import psList from 'ps-list'
import { logger } from '@infra/logging'
import type { ProcDetails } from '@shared/interfaces/common'

/**
 * Cache of running processes sourced from ps-list, refreshed on demand.
 */
export class ProcessTracker {
  private readonly procCache = new Map<number, ProcDetails>()
  private refreshing: Promise<void> | null = null

  refreshProcesses(): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.loadProcesses().finally(() => {
        this.refreshing = null
      })
    }
    return this.refreshing
  }

  private async loadProcesses(): Promise<void> {
    try {
      const processes = await psList()
      this.procCache.clear()

      for (const proc of processes) {
        this.procCache.set(proc.pid, {
          pid: proc.pid,
          name: proc.name,
          cmd: proc.cmd,
          ppid: proc.ppid
        })
      }
    } catch (error) {
      // Keep serving the previous list.
      logger.error('Failed to refresh process cache', error)
    }
  }

  getProcess(pid: number): ProcDetails | undefined {
    return this.procCache.get(pid)
  }

  getProcessName(pid: number): string | undefined {
    return this.procCache.get(pid)?.name
  }

  get size(): number {
    return this.procCache.size
  }
}
