import { subDays } from 'date-fns'
import { CLEANUP_HOUR, RETENTION_DAYS, SUMMARY_CHECK_INTERVAL_MS } from '@config/constants'
import { logger } from '@infra/logging'
import type { DailySummaryRow, UsageRepository } from '@shared/interfaces/common'
import { enumerateDates, formatLocalDate } from '@shared/utils/date-utils'

export interface SummaryManagerOptions {
  retentionDays?: number
  cleanupHour?: number
  checkIntervalMs?: number
}

/**
 * Rolls raw samples into per-day application totals and prunes samples past
 * the retention horizon.
 */
export class SummaryManager {
  private readonly retentionDays: number
  private readonly cleanupHour: number
  private readonly checkIntervalMs: number

  private lastAggregated: string | null = null
  private lastCleanupDate: string | null = null
  private checkTimer: NodeJS.Timeout | null = null

  constructor(
    private readonly repository: UsageRepository,
    options: SummaryManagerOptions = {}
  ) {
    this.retentionDays = options.retentionDays ?? RETENTION_DAYS
    this.cleanupHour = options.cleanupHour ?? CLEANUP_HOUR
    this.checkIntervalMs = options.checkIntervalMs ?? SUMMARY_CHECK_INTERVAL_MS
  }

  /** Runs one aggregation check and one retention sweep, then checks hourly. */
  async start(): Promise<void> {
    if (this.checkTimer) {
      logger.warn('Summary manager already running')
      return
    }

    this.checkTimer = setInterval(() => {
      void this.runScheduledCheck()
    }, this.checkIntervalMs)
    logger.info('Summary manager started')

    await this.checkAndAggregate()
    await this.runCleanup(new Date())
  }

  stop(): void {
    if (!this.checkTimer) return

    clearInterval(this.checkTimer)
    this.checkTimer = null
    logger.info('Summary manager stopped')
  }

  get lastAggregationDate(): string | null {
    return this.lastAggregated
  }

  /**
   * Aggregates yesterday once per calendar day. A failure leaves the marker
   * untouched so the next check retries.
   */
  async checkAndAggregate(): Promise<boolean> {
    const now = new Date()
    const today = formatLocalDate(now)
    if (this.lastAggregated === today) return false

    const yesterday = formatLocalDate(subDays(now, 1))
    try {
      logger.info(`Aggregating data for ${yesterday}`)
      await this.repository.aggregateDaily(yesterday)
      this.lastAggregated = today
      logger.info(`Successfully aggregated data for ${yesterday}`)
      return true
    } catch (error) {
      logger.error('Error aggregating daily data', error)
      return false
    }
  }

  async aggregateDate(date: string): Promise<void> {
    try {
      logger.info(`Manually aggregating data for ${date}`)
      await this.repository.aggregateDaily(date)
    } catch (error) {
      logger.error(`Error aggregating data for ${date}`, error)
      throw error
    }
  }

  /** Aggregates each day from `start` through `end`; resolves with the dates that failed. */
  async aggregateDateRange(start: string, end: string): Promise<string[]> {
    const failed: string[] = []

    for (const date of enumerateDates(start, end)) {
      try {
        await this.aggregateDate(date)
      } catch {
        failed.push(date)
      }
    }

    if (failed.length > 0) {
      logger.warn(`Aggregation failed for ${failed.length} dates`, { failed })
    }
    return failed
  }

  async forceCleanup(retentionDays: number = this.retentionDays): Promise<number> {
    try {
      logger.info(`Force cleanup with ${retentionDays} days retention`)
      return await this.repository.cleanupOldData(retentionDays)
    } catch (error) {
      logger.error('Error during force cleanup', error)
      throw error
    }
  }

  getDailySummary(date: string): Promise<DailySummaryRow[]> {
    return this.repository.getDailySummary(date)
  }

  getAvailableDates(): Promise<string[]> {
    return this.repository.getAvailableDates()
  }

  private async runScheduledCheck(): Promise<void> {
    await this.checkAndAggregate()

    const now = new Date()
    if (now.getHours() === this.cleanupHour && this.lastCleanupDate !== formatLocalDate(now)) {
      await this.runCleanup(now)
    }
  }

  private async runCleanup(now: Date): Promise<void> {
    try {
      logger.info('Running data retention cleanup')
      await this.repository.cleanupOldData(this.retentionDays, now)
      this.lastCleanupDate = formatLocalDate(now)
    } catch (error) {
      logger.error('Error during data cleanup', error)
    }
  }
}
