import { existsSync, mkdirSync } from 'fs'
import { homedir } from 'os'
import { dirname, join } from 'path'
import { isDevelopment } from '@shared/utils/environment'

export const DEV_DATA_PATH = join(process.cwd(), '.dev-data')

/**
 * Resolves the SQLite file location and makes sure its directory exists.
 * `:memory:` is passed through untouched.
 */
export function getDatabasePath(override?: string): string {
  if (override === ':memory:') return override

  const dbPath =
    override ??
    (isDevelopment() ? join(DEV_DATA_PATH, 'dev.db') : join(homedir(), '.netmeter', 'usage.db'))

  const dbDir = dirname(dbPath)
  if (!existsSync(dbDir)) {
    mkdirSync(dbDir, { recursive: true })
  }

  return dbPath
}
