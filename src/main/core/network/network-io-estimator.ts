import { ESTIMATED_BYTES_PER_CONNECTION } from '@config/constants'
import type { ByteCounters } from '@shared/interfaces/common'

/**
 * Stand-in for per-process byte counters when the OS does not expose them.
 * Returned values are cumulative and never decrease for a tracked pid.
 */
export interface NetworkIOEstimator {
  estimate(pid: number, connectionCount: number): ByteCounters
  /** Drops state of every pid not in `activePids`. */
  retain(activePids: ReadonlySet<number>): void
  reset(): void
}

/**
 * Credits a fixed number of bytes per open connection per call, in both
 * directions. A rough activity proxy, not a measurement.
 */
export class ConnectionCountEstimator implements NetworkIOEstimator {
  private readonly estimates = new Map<number, ByteCounters>()

  constructor(private readonly bytesPerConnection: number = ESTIMATED_BYTES_PER_CONNECTION) {}

  estimate(pid: number, connectionCount: number): ByteCounters {
    const previous = this.estimates.get(pid) ?? { bytesSent: 0, bytesRecv: 0 }
    const increment = Math.max(0, connectionCount) * this.bytesPerConnection
    const next = {
      bytesSent: previous.bytesSent + increment,
      bytesRecv: previous.bytesRecv + increment
    }
    this.estimates.set(pid, next)
    return { ...next }
  }

  retain(activePids: ReadonlySet<number>): void {
    for (const pid of this.estimates.keys()) {
      if (!activePids.has(pid)) this.estimates.delete(pid)
    }
  }

  reset(): void {
    this.estimates.clear()
  }

  get trackedCount(): number {
    return this.estimates.size
  }
}
