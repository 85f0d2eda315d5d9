import { MAX_PENDING_SAMPLES, PERSIST_INTERVAL_MS } from '@config/constants'
import { logger } from '@infra/logging'
import type { Sample, Snapshot, UsageRepository } from '@shared/interfaces/common'
import { toEpochSeconds } from '@shared/utils/date-utils'

/**
 * Buffers samples in memory and writes them to storage in batches. Flushes
 * run one at a time; a failed batch is kept for the next attempt.
 */
export class DataPersister {
  private pending: Sample[] = []
  private flushTimer: NodeJS.Timeout | null = null
  private flushChain: Promise<number> = Promise.resolve(0)

  constructor(
    private readonly repository: UsageRepository,
    private readonly intervalMs: number = PERSIST_INTERVAL_MS
  ) {}

  enqueue(sample: Sample): void {
    this.pending.push(sample)
  }

  /** Queues every entry that moved bytes; connection-only entries are skipped. */
  enqueueSnapshot(snapshot: Snapshot, timestamp: number = toEpochSeconds(new Date())): void {
    for (const usage of snapshot.values()) {
      if (usage.bytesSent <= 0 && usage.bytesRecv <= 0) continue
      this.enqueue({
        timestamp,
        pid: usage.pid,
        processName: usage.processName,
        appName: usage.appName,
        bytesSent: usage.bytesSent,
        bytesRecv: usage.bytesRecv
      })
    }
  }

  get pendingCount(): number {
    return this.pending.length
  }

  start(): void {
    if (this.flushTimer) {
      logger.warn('Data persister already running')
      return
    }

    this.flushTimer = setInterval(() => {
      void this.flush()
    }, this.intervalMs)
    logger.info('Data persister started', { intervalMs: this.intervalMs })
  }

  /** Writes whatever is still buffered, whether or not the timer was started. */
  async stop(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer)
      this.flushTimer = null
    }

    const written = await this.flush()
    logger.info('Data persister stopped', { finalFlush: written, pending: this.pending.length })
  }

  /** Resolves with the number of samples written by this flush. Never rejects. */
  flush(): Promise<number> {
    this.flushChain = this.flushChain.catch(() => 0).then(() => this.writePending())
    return this.flushChain
  }

  private async writePending(): Promise<number> {
    if (this.pending.length === 0) return 0

    const batch = this.pending
    this.pending = []

    try {
      await this.repository.insertSamplesBatch(batch)
      logger.debug(`Persisted ${batch.length} samples to database`)
      return batch.length
    } catch (error) {
      logger.error('Error persisting samples', error)
      // Failed batch goes back ahead of anything queued since the swap.
      this.pending = batch.concat(this.pending).slice(-MAX_PENDING_SAMPLES)
      return 0
    }
  }
}
