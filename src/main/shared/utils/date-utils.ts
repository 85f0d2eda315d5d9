import { eachDayOfInterval, format, getUnixTime, isValid, parse } from 'date-fns'
import { SECONDS_PER_DAY } from '@config/constants'

const DATE_FORMAT = 'yyyy-MM-dd'
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

/** Local calendar date as YYYY-MM-DD. */
export function formatLocalDate(date: Date): string {
  return format(date, DATE_FORMAT)
}

/** Local midnight of a YYYY-MM-DD date. Throws on malformed or impossible dates. */
export function parseLocalDate(value: string): Date {
  if (!DATE_PATTERN.test(value)) {
    throw new RangeError(`Invalid date "${value}", expected YYYY-MM-DD`)
  }

  const date = parse(value, DATE_FORMAT, new Date())
  if (!isValid(date) || formatLocalDate(date) !== value) {
    throw new RangeError(`Invalid date "${value}"`)
  }
  return date
}

export function toEpochSeconds(date: Date): number {
  return getUnixTime(date)
}

/**
 * Aggregation window of a calendar day: [local midnight, local midnight + 24h).
 */
export function dayBounds(value: string): { startTs: number; endTs: number } {
  const startTs = toEpochSeconds(parseLocalDate(value))
  return { startTs, endTs: startTs + SECONDS_PER_DAY }
}

/** Every date from `start` to `end` inclusive; empty when start is after end. */
export function enumerateDates(start: string, end: string): string[] {
  const first = parseLocalDate(start)
  const last = parseLocalDate(end)
  if (first > last) return []

  return eachDayOfInterval({ start: first, end: last }).map((day) => formatLocalDate(day))
}
