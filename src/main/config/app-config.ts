import { z } from 'zod'
import {
  CLEANUP_HOUR,
  DEFAULT_HIGH_BANDWIDTH_THRESHOLD,
  PERSIST_INTERVAL_MS,
  RECOMMENDATION_INTERVAL_MS,
  RETENTION_DAYS,
  SAMPLE_INTERVAL_MS
} from '@config/constants'
import { ConfigError } from '@shared/errors'

export interface AppConfig {
  /** Explicit database file; when absent the environment default is used. */
  dbPath?: string
  sampleIntervalMs: number
  persistIntervalMs: number
  recommendationIntervalMs: number
  retentionDays: number
  cleanupHour: number
  highBandwidthThreshold: number
}

type Env = Record<string, string | undefined>

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

function integerVar(fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback))
}

const envSchema = z.object({
  NETMETER_DB_PATH: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined),
  NETMETER_SAMPLE_INTERVAL_MS: integerVar(SAMPLE_INTERVAL_MS, 100),
  NETMETER_PERSIST_INTERVAL_MS: integerVar(PERSIST_INTERVAL_MS, 100),
  NETMETER_RECOMMENDATION_INTERVAL_MS: integerVar(RECOMMENDATION_INTERVAL_MS, 100),
  NETMETER_RETENTION_DAYS: integerVar(RETENTION_DAYS, 1),
  NETMETER_CLEANUP_HOUR: integerVar(CLEANUP_HOUR, 0, 23),
  // bytes per second
  NETMETER_BANDWIDTH_THRESHOLD: integerVar(DEFAULT_HIGH_BANDWIDTH_THRESHOLD, 0)
})

export function loadConfig(env: Env = process.env): AppConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const key = String(result.error.issues[0]?.path[0] ?? 'environment')
    throw new ConfigError(key, env[key] ?? '')
  }

  const parsed = result.data
  return {
    dbPath: parsed.NETMETER_DB_PATH,
    sampleIntervalMs: parsed.NETMETER_SAMPLE_INTERVAL_MS,
    persistIntervalMs: parsed.NETMETER_PERSIST_INTERVAL_MS,
    recommendationIntervalMs: parsed.NETMETER_RECOMMENDATION_INTERVAL_MS,
    retentionDays: parsed.NETMETER_RETENTION_DAYS,
    cleanupHour: parsed.NETMETER_CLEANUP_HOUR,
    highBandwidthThreshold: parsed.NETMETER_BANDWIDTH_THRESHOLD
  }
}
