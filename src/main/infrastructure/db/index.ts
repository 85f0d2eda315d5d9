import Database from 'better-sqlite3'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import { logger } from '@infra/logging'
import * as schema from './schema'
import { ensureSchema } from './migrate'
import { getDatabasePath } from './utils'

export type AppDatabase = BetterSQLite3Database<typeof schema>

let db: AppDatabase | null = null
let sqliteClient: Database.Database | null = null

/**
 * Opens (once per process) the usage database and creates missing tables.
 * Schema failures close the handle and propagate.
 */
export function openDatabase(dbPathOverride?: string): AppDatabase {
  if (db) {
    return db
  }

  const dbPath = getDatabasePath(dbPathOverride)
  logger.info('Opening database', { dbPath })

  const client = new Database(dbPath)
  try {
    client.pragma('journal_mode = WAL')
    ensureSchema(client)
  } catch (error) {
    client.close()
    throw error
  }

  sqliteClient = client
  db = drizzle(client, { schema })

  return db
}

export function closeDatabase(): void {
  if (sqliteClient) {
    try {
      sqliteClient.close()
      logger.info('Database connection closed')
    } catch (error) {
      logger.error('Error closing database', error)
    }
    sqliteClient = null
    db = null
  }
}

export { schema }
