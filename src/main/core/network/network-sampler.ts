import {
  LIMITED_PERMISSIONS_WARNING,
  SAMPLE_INTERVAL_MS,
  STOP_JOIN_TIMEOUT_MS
} from '@config/constants'
import { logger } from '@infra/logging'
import type {
  BandwidthTotals,
  ByteCounters,
  ProcessInfoProvider,
  ProcessUsage,
  Snapshot,
  SnapshotListener,
  TopProcess
} from '@shared/interfaces/common'
import { ConnectionCountEstimator, type NetworkIOEstimator } from './network-io-estimator'
import { ProcessInfoResolver } from './process-info-resolver'

export interface NetworkSamplerOptions {
  intervalMs?: number
  joinTimeoutMs?: number
  resolver?: ProcessInfoResolver
  estimator?: NetworkIOEstimator
}

export function summarizeBandwidth(snapshot: Snapshot): BandwidthTotals {
  let bytesSent = 0
  let bytesRecv = 0
  for (const usage of snapshot.values()) {
    bytesSent += usage.bytesSent
    bytesRecv += usage.bytesRecv
  }
  return { bytesSent, bytesRecv, total: bytesSent + bytesRecv }
}

/**
 * Periodically captures per-process byte deltas and publishes each snapshot
 * to subscribers. Ticks never overlap: the next one is scheduled only after
 * the current one finishes.
 */
export class NetworkSampler {
  private readonly intervalMs: number
  private readonly joinTimeoutMs: number
  private readonly resolver: ProcessInfoResolver
  private readonly estimator: NetworkIOEstimator
  private readonly listeners = new Set<SnapshotListener>()

  private previousCounters = new Map<number, ByteCounters>()
  private latest: Snapshot = new Map()
  private warning: string | null = null

  private running = false
  /** Bumped by every start(); a loop stops rescheduling once it no longer matches. */
  private generation = 0
  private timer: NodeJS.Timeout | null = null
  private inFlight: Promise<void> | null = null

  constructor(
    private readonly provider: ProcessInfoProvider,
    options: NetworkSamplerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? SAMPLE_INTERVAL_MS
    this.joinTimeoutMs = options.joinTimeoutMs ?? STOP_JOIN_TIMEOUT_MS
    this.resolver = options.resolver ?? new ProcessInfoResolver(provider)
    this.estimator = options.estimator ?? new ConnectionCountEstimator()
  }

  start(): void {
    if (this.running) {
      logger.warn('Network sampler already running')
      return
    }

    this.running = true
    const generation = ++this.generation

    // A tick abandoned by a timed-out stop() finishes before the new loop begins.
    if (this.inFlight) {
      void this.inFlight.then(() => this.scheduleNext(0, generation))
    } else {
      this.scheduleNext(0, generation)
    }
    logger.info('Network sampler started', { intervalMs: this.intervalMs })
  }

  async stop(): Promise<void> {
    if (!this.running) return

    this.running = false
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }

    if (this.inFlight) {
      let joinTimer: NodeJS.Timeout | undefined
      const timedOut = await Promise.race([
        this.inFlight.then(() => false),
        new Promise<boolean>((resolve) => {
          joinTimer = setTimeout(() => resolve(true), this.joinTimeoutMs)
        })
      ])
      clearTimeout(joinTimer)

      if (timedOut) {
        logger.warn(`Sampling tick still running after ${this.joinTimeoutMs}ms, not waiting`)
      }
    }

    logger.info('Network sampler stopped')
  }

  get isRunning(): boolean {
    return this.running
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  latestSnapshot(): Map<number, ProcessUsage> {
    return new Map(this.latest)
  }

  totalBandwidth(): BandwidthTotals {
    return summarizeBandwidth(this.latest)
  }

  topProcesses(n: number = 5): TopProcess[] {
    return Array.from(this.latest.values(), (usage) => ({
      ...usage,
      total: usage.bytesSent + usage.bytesRecv
    }))
      .sort((a, b) => b.total - a.total)
      .slice(0, Math.max(0, n))
  }

  get permissionsWarning(): string | null {
    return this.warning
  }

  /** One capture without publishing; advances the per-pid counter baseline. */
  async captureSnapshot(): Promise<Snapshot> {
    const connections = await this.provider.enumerateActiveConnections()
    const currentCounters = new Map<number, ByteCounters>()
    const snapshot = new Map<number, ProcessUsage>()

    for (const { pid, connectionCount } of connections) {
      if (connectionCount <= 0) continue

      try {
        const counters =
          (await this.provider.getCumulativeIo(pid)) ??
          this.estimator.estimate(pid, connectionCount)
        const info = await this.resolver.resolve(pid)

        const previous = this.previousCounters.get(pid)
        const bytesSent = previous ? Math.max(0, counters.bytesSent - previous.bytesSent) : 0
        const bytesRecv = previous ? Math.max(0, counters.bytesRecv - previous.bytesRecv) : 0
        currentCounters.set(pid, counters)

        if (bytesSent > 0 || bytesRecv > 0 || connectionCount > 0) {
          snapshot.set(
            pid,
            Object.freeze({
              pid,
              processName: info.processName,
              appName: info.appName,
              bytesSent,
              bytesRecv,
              connectionCount
            })
          )
        }
      } catch (error) {
        logger.debug(`Skipping PID ${pid} for this sample`, error)
      }
    }

    this.retireMissing(currentCounters)
    this.previousCounters = currentCounters

    if (snapshot.size === 0 && this.warning === null) {
      this.warning = LIMITED_PERMISSIONS_WARNING
      logger.warn(LIMITED_PERMISSIONS_WARNING)
    }

    return snapshot
  }

  private retireMissing(currentCounters: ReadonlyMap<number, ByteCounters>): void {
    for (const pid of this.previousCounters.keys()) {
      if (!currentCounters.has(pid)) this.resolver.invalidate(pid)
    }
    this.estimator.retain(new Set(currentCounters.keys()))
  }

  private scheduleNext(delayMs: number, generation: number): void {
    if (!this.running || generation !== this.generation) return

    this.timer = setTimeout(() => {
      this.timer = null
      const tick: Promise<void> = this.runTick(generation).finally(() => {
        if (this.inFlight === tick) this.inFlight = null
      })
      this.inFlight = tick
    }, delayMs)
  }

  private async runTick(generation: number): Promise<void> {
    const startedAt = Date.now()
    let delayMs = this.intervalMs

    try {
      const snapshot = await this.captureSnapshot()
      this.publish(snapshot)
      delayMs = Math.max(0, this.intervalMs - (Date.now() - startedAt))
    } catch (error) {
      logger.error('Network sampling failed', error)
    }

    this.scheduleNext(delayMs, generation)
  }

  private publish(snapshot: Snapshot): void {
    this.latest = snapshot

    for (const listener of Array.from(this.listeners)) {
      try {
        const result = listener(new Map(snapshot))
        if (result instanceof Promise) {
          void result.catch((error: unknown) => {
            logger.error('Snapshot listener rejected', error)
          })
        }
      } catch (error) {
        logger.error('Snapshot listener failed', error)
      }
    }
  }
}
