import { subDays } from 'date-fns'
import { ConfigError } from '@shared/errors'
import { formatLocalDate } from '@shared/utils/date-utils'
import { logger } from '@infra/logging'
import type { SummaryManager } from '@core/usage/summary-manager'

export interface BackfillOptions {
  range?: { start: string; end: string }
  /** Retention days for a forced sweep; `null` uses the configured value. */
  cleanup?: number | null
}

export const BACKFILL_USAGE = 'Usage: backfill <start YYYY-MM-DD> [end YYYY-MM-DD] [--cleanup[=days]]'

/** `end` defaults to yesterday (relative to `now`). */
export function parseBackfillArgs(argv: readonly string[], now: Date = new Date()): BackfillOptions {
  const options: BackfillOptions = {}
  const positional: string[] = []

  for (const arg of argv) {
    if (arg === '--cleanup') {
      options.cleanup = null
    } else if (arg.startsWith('--cleanup=')) {
      const raw = arg.slice('--cleanup='.length)
      const days = Number(raw)
      if (!Number.isInteger(days) || days < 1) {
        throw new ConfigError('--cleanup', raw)
      }
      options.cleanup = days
    } else if (arg.startsWith('--')) {
      throw new ConfigError('argument', arg)
    } else {
      positional.push(arg)
    }
  }

  if (positional.length > 2) {
    throw new ConfigError('argument', positional.slice(2).join(' '))
  }

  const [start, end] = positional
  if (start) {
    options.range = { start, end: end ?? formatLocalDate(subDays(now, 1)) }
  }

  return options
}

export interface BackfillResult {
  failedDates: string[]
  deletedSamples?: number
}

export async function runBackfill(
  manager: SummaryManager,
  options: BackfillOptions
): Promise<BackfillResult> {
  const result: BackfillResult = { failedDates: [] }

  if (options.range) {
    const { start, end } = options.range
    logger.info(`Backfilling daily summaries from ${start} to ${end}`)
    result.failedDates = await manager.aggregateDateRange(start, end)
  }

  if (options.cleanup !== undefined) {
    result.deletedSamples = await manager.forceCleanup(options.cleanup ?? undefined)
  }

  return result
}
