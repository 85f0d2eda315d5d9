/**
 * The process exited between enumeration and lookup, or its details are not
 * readable with the current privileges.
 */
export class ProcessUnavailableError extends Error {
  constructor(
    readonly pid: number,
    readonly reason: 'gone' | 'access-denied',
    options?: { cause?: unknown }
  ) {
    super(`Process ${pid} is unavailable (${reason})`, options)
    this.name = 'ProcessUnavailableError'
  }
}

export class StorageError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`Storage operation "${operation}" failed: ${describeCause(cause)}`, { cause })
    this.name = 'StorageError'
  }
}

export class ConfigError extends Error {
  constructor(
    readonly key: string,
    readonly value: string
  ) {
    super(`Invalid value for ${key}: "${value}"`)
    this.name = 'ConfigError'
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return String(cause)
}
