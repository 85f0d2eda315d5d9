import { NETSTAT_TIMEOUT_MS, TCP_STATES } from '@config/constants'
import { logger } from '@infra/logging'
import type { ActiveConnectionCount } from '@shared/interfaces/common'
import { isLoopbackAddress, isUnspecifiedAddress } from '@shared/utils/address-normalizer'
import { listSockets, type SocketRow } from './netstat-runner'

function isActiveSocket(row: SocketRow): boolean {
  if (isLoopbackAddress(row.local.address) || isLoopbackAddress(row.remote.address)) {
    return false
  }

  if (row.protocol === 'TCP') {
    return row.state !== undefined && TCP_STATES.has(row.state.toUpperCase())
  }

  // UDP has no state; only sockets bound to a concrete peer count.
  return !isUnspecifiedAddress(row.remote.address) && row.remote.port !== undefined
}

/**
 * Per-pid count of non-loopback sockets that are carrying traffic. Rows
 * without a pid (sockets of other users without privileges) are ignored.
 */
export function countActiveConnections(rows: readonly SocketRow[]): ActiveConnectionCount[] {
  const counts = new Map<number, number>()

  for (const row of rows) {
    if (row.pid === undefined || row.pid <= 0) continue
    if (!isActiveSocket(row)) continue
    counts.set(row.pid, (counts.get(row.pid) ?? 0) + 1)
  }

  return Array.from(counts, ([pid, connectionCount]) => ({ pid, connectionCount }))
}

export class ConnectionTracker {
  private inFlight: Promise<ActiveConnectionCount[]> | null = null

  constructor(private readonly timeoutMs: number = NETSTAT_TIMEOUT_MS) {}

  /** Concurrent callers share one netstat run. */
  refreshConnections(): Promise<ActiveConnectionCount[]> {
    if (!this.inFlight) {
      this.inFlight = this.collect().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  private async collect(): Promise<ActiveConnectionCount[]> {
    const rows = await listSockets(this.timeoutMs)
    const counts = countActiveConnections(rows)
    logger.debug('Connection scan complete', { sockets: rows.length, processes: counts.length })
    return counts
  }
}
