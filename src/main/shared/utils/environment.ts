/**
 * Check if the application is running in development mode.
 * Anything other than NODE_ENV=production counts as development.
 */
export function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production'
}
