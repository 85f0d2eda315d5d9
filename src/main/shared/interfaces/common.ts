export interface ByteCounters {
  bytesSent: number
  bytesRecv: number
}

export interface ProcessInfo {
  pid: number
  processName: string
  appName: string
  cmdline: string
}

export interface ProcDetails {
  pid: number
  name: string
  cmd?: string
  ppid?: number
}

export interface ActiveConnectionCount {
  pid: number
  connectionCount: number
}

export interface ProcessUsage {
  readonly pid: number
  readonly processName: string
  readonly appName: string
  readonly bytesSent: number
  readonly bytesRecv: number
  readonly connectionCount: number
}

/** One sampling tick, keyed by pid. */
export type Snapshot = ReadonlyMap<number, ProcessUsage>

export type SnapshotListener = (snapshot: Snapshot) => void | Promise<void>

export interface BandwidthTotals {
  bytesSent: number
  bytesRecv: number
  total: number
}

export interface TopProcess extends ProcessUsage {
  readonly total: number
}

export interface Sample {
  timestamp: number
  pid: number
  processName: string
  appName: string | null
  bytesSent: number
  bytesRecv: number
}

export interface StoredSample extends Sample {
  id: number
}

export interface DailySummaryRow {
  appName: string
  bytesSent: number
  bytesRecv: number
  totalBytes: number
}

export interface AppUsage {
  bytesSent: number
  bytesRecv: number
  total: number
  pids: number[]
}

/**
 * Durable store for raw samples and daily summaries.
 */
export interface UsageRepository {
  insertSample(sample: Sample): Promise<void>
  insertSamplesBatch(samples: readonly Sample[]): Promise<void>
  /** Inclusive bounds, ascending by timestamp. */
  getSamplesForRange(startTs: number, endTs: number): Promise<StoredSample[]>
  /** Replaces the summary rows of `date` (YYYY-MM-DD) in one transaction. */
  aggregateDaily(date: string): Promise<void>
  getDailySummary(date: string): Promise<DailySummaryRow[]>
  cleanupOldData(retentionDays: number, now?: Date): Promise<number>
  getAvailableDates(): Promise<string[]>
}

/**
 * OS-facing process information. Per-pid calls may reject with
 * ProcessUnavailableError when the process is gone or not readable.
 */
export interface ProcessInfoProvider {
  enumerateActiveConnections(): Promise<ActiveConnectionCount[]>
  describeProcess(pid: number): Promise<{ name: string; cmdline: string }>
  getExecutablePath(pid: number): Promise<string | undefined>
  getCumulativeIo(pid: number): Promise<ByteCounters | undefined>
  getProductName(exePath: string): Promise<string | undefined>
}
