import {
  BROWSER_KEYWORDS,
  BYTES_PER_MEBIBYTE,
  DEFAULT_HIGH_BANDWIDTH_THRESHOLD,
  DOMINANT_APP_SHARE,
  GAME_PLATFORM_KEYWORDS,
  MODERATE_APP_MAX_SHARE,
  MODERATE_APP_MIN_COUNT,
  MODERATE_APP_MIN_SHARE,
  SYNC_SERVICES,
  SYNC_SERVICES_SHARE,
  SYSTEM_PROCESS_SHARE,
  SYSTEM_PROCESSES,
  TORRENT_KEYWORDS
} from '@config/constants'
import { logger } from '@infra/logging'
import type { AppUsage, BandwidthTotals, Snapshot } from '@shared/interfaces/common'

type AppUsageMap = ReadonlyMap<string, AppUsage>

const formatRate = (bytes: number): string => (bytes / BYTES_PER_MEBIBYTE).toFixed(2)
const formatShare = (share: number): string => share.toFixed(0)

function matchesAny(appName: string, keywords: readonly string[]): boolean {
  const lower = appName.toLowerCase()
  return keywords.some((keyword) => lower.includes(keyword))
}

function dominantAppAdvice(appName: string): string {
  if (matchesAny(appName, BROWSER_KEYWORDS)) {
    return 'Consider pausing video playback or closing unused tabs.'
  }
  if (matchesAny(appName, GAME_PLATFORM_KEYWORDS)) {
    return 'Pause game downloads or updates.'
  }
  if (matchesAny(appName, TORRENT_KEYWORDS)) {
    return 'Pause or limit torrent downloads.'
  }
  return 'Consider closing or limiting this application.'
}

/**
 * Stateless rule evaluator turning a snapshot into human-readable advisories.
 * Rules run in a fixed order and each contributes zero or more messages.
 */
export class UsageRecommender {
  private highBandwidthThreshold: number

  constructor(threshold: number = DEFAULT_HIGH_BANDWIDTH_THRESHOLD) {
    this.highBandwidthThreshold = UsageRecommender.validateThreshold(threshold)
  }

  get threshold(): number {
    return this.highBandwidthThreshold
  }

  setThreshold(bytesPerSecond: number): void {
    this.highBandwidthThreshold = UsageRecommender.validateThreshold(bytesPerSecond)
    logger.info(`Updated bandwidth threshold to ${formatRate(bytesPerSecond)} MB/s`)
  }

  getRecommendations(snapshot: Snapshot, totals: BandwidthTotals): string[] {
    const grandTotal = totals.total
    if (snapshot.size === 0 || grandTotal === 0) return []

    const apps = this.aggregateByApp(snapshot)

    return [
      ...this.checkDominantApps(apps, grandTotal),
      ...this.checkSyncServices(apps, grandTotal),
      ...this.checkSystemProcesses(apps, grandTotal),
      ...this.checkBandwidthThreshold(grandTotal),
      ...this.checkMultipleApps(apps, grandTotal)
    ]
  }

  /** Per-application totals; entries without an app name group under the process name. */
  aggregateByApp(snapshot: Snapshot): Map<string, AppUsage> {
    const apps = new Map<string, AppUsage>()

    for (const [pid, usage] of snapshot) {
      const key = usage.appName || usage.processName
      const entry = apps.get(key) ?? { bytesSent: 0, bytesRecv: 0, total: 0, pids: [] }
      entry.bytesSent += usage.bytesSent
      entry.bytesRecv += usage.bytesRecv
      entry.total += usage.bytesSent + usage.bytesRecv
      entry.pids.push(pid)
      apps.set(key, entry)
    }

    return apps
  }

  private checkDominantApps(apps: AppUsageMap, grandTotal: number): string[] {
    const messages: string[] = []

    for (const [appName, usage] of apps) {
      const share = (usage.total / grandTotal) * 100
      if (share <= DOMINANT_APP_SHARE) continue

      messages.push(
        `⚠️ ${appName} is using ${formatShare(share)}% of bandwidth ` +
          `(${formatRate(usage.total)} MB/s). ${dominantAppAdvice(appName)}`
      )
    }

    return messages
  }

  private checkSyncServices(apps: AppUsageMap, grandTotal: number): string[] {
    let syncTotal = 0
    const syncApps: string[] = []

    for (const [appName, usage] of apps) {
      if (!matchesAny(appName, SYNC_SERVICES)) continue
      syncTotal += usage.total
      syncApps.push(appName)
    }

    const share = (syncTotal / grandTotal) * 100
    if (syncTotal === 0 || share <= SYNC_SERVICES_SHARE) return []

    return [
      `💾 Background sync services (${syncApps.join(', ')}) are using ` +
        `${formatShare(share)}% of bandwidth (${formatRate(syncTotal)} MB/s). ` +
        'Consider pausing cloud sync temporarily.'
    ]
  }

  private checkSystemProcesses(apps: AppUsageMap, grandTotal: number): string[] {
    const messages: string[] = []

    for (const [appName, usage] of apps) {
      if (!matchesAny(appName, SYSTEM_PROCESSES)) continue

      const share = (usage.total / grandTotal) * 100
      if (share <= SYSTEM_PROCESS_SHARE) continue

      messages.push(
        `🖥️ System process (${appName}) is using ${formatShare(share)}% ` +
          `of bandwidth (${formatRate(usage.total)} MB/s). ` +
          'This may be Windows Update or system maintenance. ' +
          'Check Windows Update settings to defer updates.'
      )
    }

    return messages
  }

  private checkBandwidthThreshold(grandTotal: number): string[] {
    if (grandTotal <= this.highBandwidthThreshold) return []

    return [
      `📊 High bandwidth usage detected: ${formatRate(grandTotal)} MB/s ` +
        `(threshold: ${formatRate(this.highBandwidthThreshold)} MB/s). ` +
        'Consider enabling data saver mode in browsers and streaming apps.'
    ]
  }

  private checkMultipleApps(apps: AppUsageMap, grandTotal: number): string[] {
    const moderate: Array<{ appName: string; share: number; total: number }> = []

    for (const [appName, usage] of apps) {
      const share = (usage.total / grandTotal) * 100
      if (share >= MODERATE_APP_MIN_SHARE && share <= MODERATE_APP_MAX_SHARE) {
        moderate.push({ appName, share, total: usage.total })
      }
    }

    if (moderate.length < MODERATE_APP_MIN_COUNT) return []

    const combined = moderate.reduce((sum, app) => sum + app.total, 0)
    const listed = moderate
      .slice(0, MODERATE_APP_MIN_COUNT)
      .map((app) => `${app.appName} (${formatShare(app.share)}%)`)
      .join(', ')

    return [
      `📱 Multiple applications are actively using bandwidth: ${listed}. ` +
        `Combined usage: ${formatRate(combined)} MB/s. ` +
        'Consider closing non-essential applications.'
    ]
  }

  private static validateThreshold(value: number): number {
    if (!Number.isFinite(value) || value < 0) {
      throw new RangeError(`Bandwidth threshold must be a non-negative number, got ${value}`)
    }
    return value
  }
}
