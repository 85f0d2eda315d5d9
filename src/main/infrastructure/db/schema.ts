import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core'

export const samples = sqliteTable(
  'sample',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    timestamp: integer('timestamp').notNull(),
    pid: integer('pid').notNull(),
    processName: text('process_name').notNull(),
    appName: text('app_name'),
    bytesSent: integer('bytes_sent').notNull(),
    bytesRecv: integer('bytes_recv').notNull()
  },
  (table) => [
    index('idx_sample_timestamp').on(table.timestamp),
    index('idx_sample_pid').on(table.pid)
  ]
)

export const dailySummaries = sqliteTable(
  'daily_summary',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    date: text('date').notNull(),
    appName: text('app_name').notNull(),
    bytesSent: integer('bytes_sent').notNull(),
    bytesRecv: integer('bytes_recv').notNull()
  },
  (table) => [uniqueIndex('idx_daily_app').on(table.date, table.appName)]
)
