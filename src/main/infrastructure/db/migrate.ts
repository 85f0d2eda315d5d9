import type Database from 'better-sqlite3'
import { logger } from '@infra/logging'

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS sample (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp INTEGER NOT NULL,
    pid INTEGER NOT NULL,
    process_name TEXT NOT NULL,
    app_name TEXT,
    bytes_sent INTEGER NOT NULL,
    bytes_recv INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_sample_timestamp ON sample(timestamp)',
  'CREATE INDEX IF NOT EXISTS idx_sample_pid ON sample(pid)',
  `CREATE TABLE IF NOT EXISTS daily_summary (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    app_name TEXT NOT NULL,
    bytes_sent INTEGER NOT NULL,
    bytes_recv INTEGER NOT NULL
  )`,
  'CREATE UNIQUE INDEX IF NOT EXISTS idx_daily_app ON daily_summary(date, app_name)'
]

/**
 * Creates the sample and daily_summary tables when missing. Mirrors
 * ./schema.ts; safe to run on every startup.
 */
export function ensureSchema(sqlite: Database.Database): void {
  try {
    sqlite.transaction(() => {
      for (const statement of SCHEMA_STATEMENTS) {
        sqlite.exec(statement)
      }
    })()
    logger.info('Database schema initialized')
  } catch (error) {
    logger.error('Schema initialization failed', error)
    throw error
  }
}
