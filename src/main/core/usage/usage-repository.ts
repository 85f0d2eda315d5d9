import { and, asc, desc, eq, gte, lt, lte, sql } from 'drizzle-orm'
import type { AppDatabase } from '@infra/db'
import { dailySummaries, samples } from '@infra/db/schema'
import { logger } from '@infra/logging'
import { StorageError } from '@shared/errors'
import type {
  DailySummaryRow,
  Sample,
  StoredSample,
  UsageRepository
} from '@shared/interfaces/common'
import { dayBounds, toEpochSeconds } from '@shared/utils/date-utils'
import { SECONDS_PER_DAY } from '@config/constants'

const INSERT_CHUNK_SIZE = 500

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

export class SqliteUsageRepository implements UsageRepository {
  constructor(private readonly db: AppDatabase) {}

  async insertSample(sample: Sample): Promise<void> {
    await this.insertSamplesBatch([sample])
  }

  async insertSamplesBatch(batch: readonly Sample[]): Promise<void> {
    if (batch.length === 0) return

    await this.execute('insertSamplesBatch', () => {
      this.db.transaction((tx) => {
        for (const rows of chunk(batch, INSERT_CHUNK_SIZE)) {
          tx.insert(samples)
            .values(
              rows.map((row) => ({
                timestamp: row.timestamp,
                pid: row.pid,
                processName: row.processName,
                appName: row.appName,
                bytesSent: row.bytesSent,
                bytesRecv: row.bytesRecv
              }))
            )
            .run()
        }
      })
    })
    logger.debug(`Inserted ${batch.length} samples`)
  }

  async getSamplesForRange(startTs: number, endTs: number): Promise<StoredSample[]> {
    return this.execute('getSamplesForRange', () =>
      this.db
        .select()
        .from(samples)
        .where(and(gte(samples.timestamp, startTs), lte(samples.timestamp, endTs)))
        .orderBy(asc(samples.timestamp), asc(samples.id))
        .all()
    )
  }

  async aggregateDaily(date: string): Promise<void> {
    const { startTs, endTs } = dayBounds(date)
    const appKey = sql<string>`coalesce(${samples.appName}, ${samples.processName})`

    const inserted = await this.execute('aggregateDaily', () =>
      this.db.transaction((tx) => {
        tx.delete(dailySummaries).where(eq(dailySummaries.date, date)).run()

        const totals = tx
          .select({
            appName: appKey,
            bytesSent: sql<number>`sum(${samples.bytesSent})`.mapWith(Number),
            bytesRecv: sql<number>`sum(${samples.bytesRecv})`.mapWith(Number)
          })
          .from(samples)
          .where(and(gte(samples.timestamp, startTs), lt(samples.timestamp, endTs)))
          .groupBy(appKey)
          .all()

        for (const rows of chunk(totals, INSERT_CHUNK_SIZE)) {
          tx.insert(dailySummaries)
            .values(rows.map((row) => ({ date, ...row })))
            .run()
        }
        return totals.length
      })
    )
    logger.info(`Aggregated ${inserted} applications for ${date}`)
  }

  async getDailySummary(date: string): Promise<DailySummaryRow[]> {
    const totalBytes = sql<number>`${dailySummaries.bytesSent} + ${dailySummaries.bytesRecv}`

    return this.execute('getDailySummary', () =>
      this.db
        .select({
          appName: dailySummaries.appName,
          bytesSent: dailySummaries.bytesSent,
          bytesRecv: dailySummaries.bytesRecv,
          totalBytes: totalBytes.mapWith(Number)
        })
        .from(dailySummaries)
        .where(eq(dailySummaries.date, date))
        .orderBy(desc(totalBytes), asc(dailySummaries.appName))
        .all()
    )
  }

  async cleanupOldData(retentionDays: number, now: Date = new Date()): Promise<number> {
    const cutoff = toEpochSeconds(now) - retentionDays * SECONDS_PER_DAY

    const deleted = await this.execute(
      'cleanupOldData',
      () => this.db.delete(samples).where(lt(samples.timestamp, cutoff)).run().changes
    )
    logger.info(`Deleted ${deleted} samples older than ${retentionDays} days`)
    return deleted
  }

  async getAvailableDates(): Promise<string[]> {
    const rows = await this.execute('getAvailableDates', () =>
      this.db
        .selectDistinct({ date: dailySummaries.date })
        .from(dailySummaries)
        .orderBy(desc(dailySummaries.date))
        .all()
    )
    return rows.map((row) => row.date)
  }

  private async execute<T>(operation: string, work: () => T): Promise<T> {
    try {
      return work()
    } catch (error) {
      logger.error(`Storage operation ${operation} failed`, error)
      throw new StorageError(operation, error)
    }
  }
}
