import type { AppConfig } from '@config/app-config'
import { NetworkSampler } from '@core/network/network-sampler'
import { DataPersister } from '@core/usage/data-persister'
import { SummaryManager } from '@core/usage/summary-manager'
import { UsageRecommender } from '@core/usage/usage-recommender'
import { logger } from '@infra/logging'
import type {
  BandwidthTotals,
  DailySummaryRow,
  ProcessInfoProvider,
  ProcessUsage,
  TopProcess,
  UsageRepository
} from '@shared/interfaces/common'

type MonitorSettings = Pick<
  AppConfig,
  | 'sampleIntervalMs'
  | 'persistIntervalMs'
  | 'recommendationIntervalMs'
  | 'retentionDays'
  | 'cleanupHour'
  | 'highBandwidthThreshold'
>

/**
 * Wires the sampler, persister, summary manager and recommender together and
 * exposes the read side used by presentation code.
 */
export class UsageMonitor {
  readonly sampler: NetworkSampler
  readonly persister: DataPersister
  readonly summaryManager: SummaryManager
  readonly recommender: UsageRecommender

  private readonly recommendationIntervalMs: number
  private recommendationTimer: NodeJS.Timeout | null = null
  private unsubscribePersistence: (() => void) | null = null
  private lastAdvisories: string[] = []
  private running = false

  constructor(repository: UsageRepository, provider: ProcessInfoProvider, settings: MonitorSettings) {
    this.sampler = new NetworkSampler(provider, { intervalMs: settings.sampleIntervalMs })
    this.persister = new DataPersister(repository, settings.persistIntervalMs)
    this.summaryManager = new SummaryManager(repository, {
      retentionDays: settings.retentionDays,
      cleanupHour: settings.cleanupHour
    })
    this.recommender = new UsageRecommender(settings.highBandwidthThreshold)
    this.recommendationIntervalMs = settings.recommendationIntervalMs
  }

  async start(): Promise<void> {
    if (this.running) {
      logger.warn('Usage monitor already running')
      return
    }
    this.running = true

    this.unsubscribePersistence = this.sampler.subscribe((snapshot) => {
      this.persister.enqueueSnapshot(snapshot)
    })
    this.persister.start()
    await this.summaryManager.start()
    if (!this.running) return

    this.sampler.start()

    this.recommendationTimer = setInterval(() => {
      this.reviewRecommendations()
    }, this.recommendationIntervalMs)

    logger.info('Usage monitor started')
  }

  /** Stops sampling first so the persister's final flush sees the last snapshot. */
  async stop(): Promise<void> {
    if (!this.running) return
    this.running = false

    if (this.recommendationTimer) {
      clearInterval(this.recommendationTimer)
      this.recommendationTimer = null
    }

    await this.sampler.stop()
    this.unsubscribePersistence?.()
    this.unsubscribePersistence = null

    await this.persister.stop()
    this.summaryManager.stop()
    logger.info('Usage monitor stopped')
  }

  latestSnapshot(): Map<number, ProcessUsage> {
    return this.sampler.latestSnapshot()
  }

  totalBandwidth(): BandwidthTotals {
    return this.sampler.totalBandwidth()
  }

  topProcesses(n: number = 5): TopProcess[] {
    return this.sampler.topProcesses(n)
  }

  getRecommendations(): string[] {
    return this.recommender.getRecommendations(
      this.sampler.latestSnapshot(),
      this.sampler.totalBandwidth()
    )
  }

  getDailySummary(date: string): Promise<DailySummaryRow[]> {
    return this.summaryManager.getDailySummary(date)
  }

  getAvailableDates(): Promise<string[]> {
    return this.summaryManager.getAvailableDates()
  }

  get permissionsWarning(): string | null {
    return this.sampler.permissionsWarning
  }

  /** Logs the current advisories when they differ from the previous review. */
  reviewRecommendations(): string[] {
    const advisories = this.getRecommendations()
    const changed =
      advisories.length !== this.lastAdvisories.length ||
      advisories.some((advisory, index) => advisory !== this.lastAdvisories[index])

    if (changed) {
      advisories.forEach((advisory) => logger.info(advisory))
      this.lastAdvisories = advisories
    }
    return advisories
  }
}
