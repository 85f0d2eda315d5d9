export const SAMPLE_INTERVAL_MS = 1000
export const PERSIST_INTERVAL_MS = 5000
export const SUMMARY_CHECK_INTERVAL_MS = 60 * 60 * 1000
export const RECOMMENDATION_INTERVAL_MS = 10_000
export const STOP_JOIN_TIMEOUT_MS = 5000
export const NETSTAT_TIMEOUT_MS = 5000

export const RETENTION_DAYS = 90
export const CLEANUP_HOUR = 2
export const SECONDS_PER_DAY = 86_400

/** Oldest entries beyond this are dropped when a failed batch is re-buffered. */
export const MAX_PENDING_SAMPLES = 1000

/** Cumulative bytes credited per open connection per estimate. */
export const ESTIMATED_BYTES_PER_CONNECTION = 1024

export const BYTES_PER_MEBIBYTE = 1024 * 1024
export const DEFAULT_HIGH_BANDWIDTH_THRESHOLD = 5 * BYTES_PER_MEBIBYTE

export const LIMITED_PERMISSIONS_WARNING =
  'Limited network data available. For full per-process statistics, run with administrator privileges.'

export const TCP_STATES = new Set([
  'ESTABLISHED',
  'SYN_SENT',
  'CLOSE_WAIT',
  'FIN_WAIT1',
  'FIN_WAIT2',
  'CLOSING',
  'LAST_ACK'
])

export const BROWSER_KEYWORDS = ['chrome', 'firefox', 'edge']
export const GAME_PLATFORM_KEYWORDS = ['steam', 'epic', 'origin']
export const TORRENT_KEYWORDS = ['torrent', 'utorrent', 'bittorrent']

export const SYNC_SERVICES = [
  'onedrive',
  'dropbox',
  'googledrivesync',
  'google drive',
  'icloud',
  'sync',
  'backup',
  'megasync',
  'pcloud'
]

export const SYSTEM_PROCESSES = [
  'svchost',
  'system',
  'windows update',
  'wuauclt',
  'trustedinstaller',
  'tiworker'
]

export const DOMINANT_APP_SHARE = 50
export const SYNC_SERVICES_SHARE = 20
export const SYSTEM_PROCESS_SHARE = 15
export const MODERATE_APP_MIN_SHARE = 10
export const MODERATE_APP_MAX_SHARE = 50
export const MODERATE_APP_MIN_COUNT = 3
