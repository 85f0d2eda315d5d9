import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import { NETSTAT_TIMEOUT_MS } from '@config/constants'
import { logger } from '@infra/logging'

export interface SocketEndpoint {
  address?: string
  port?: number
}

export interface SocketRow {
  protocol: 'TCP' | 'UDP'
  local: SocketEndpoint
  remote: SocketEndpoint
  state?: string
  pid?: number
}

interface NetstatCommand {
  cmd: string
  args: string[]
}

const MAX_STDOUT_BUFFER = 10 * 1024 * 1024

const execFileAsync = promisify(execFile)

const NETSTAT_COMMANDS: Partial<Record<NodeJS.Platform, NetstatCommand>> = {
  linux: { cmd: 'netstat', args: ['-antup'] },
  darwin: { cmd: 'netstat', args: ['-vanl'] },
  win32: { cmd: 'netstat.exe', args: ['-ano'] }
}

/**
 * Runs the platform's netstat and returns every TCP/UDP socket row it lists.
 * Rejects when the command fails or times out.
 */
export async function listSockets(timeoutMs: number = NETSTAT_TIMEOUT_MS): Promise<SocketRow[]> {
  const command = NETSTAT_COMMANDS[process.platform] ?? NETSTAT_COMMANDS.linux
  if (!command) {
    throw new Error(`Unsupported platform for netstat: ${process.platform}`)
  }

  try {
    const { stdout, stderr } = await execFileAsync(command.cmd, command.args, {
      encoding: 'utf8',
      maxBuffer: MAX_STDOUT_BUFFER,
      windowsHide: true,
      timeout: timeoutMs
    })

    if (stderr.trim()) {
      logger.debug('netstat stderr output', { stderr: stderr.trim() })
    }

    return parseNetstatOutput(stdout)
  } catch (error) {
    logger.error('Failed to execute netstat command', {
      command: `${command.cmd} ${command.args.join(' ')}`,
      error
    })
    throw error
  }
}

/** Column names of the current "Proto ..." header, lower-cased with spaces joined. */
type HeaderLayout = string[]

export function parseNetstatOutput(output: string): SocketRow[] {
  const rows: SocketRow[] = []
  let header: HeaderLayout | null = null

  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed) continue

    const lower = trimmed.toLowerCase()
    if (lower.startsWith('proto')) {
      header = readHeader(trimmed)
      continue
    }

    if (header && (lower.startsWith('tcp') || lower.startsWith('udp'))) {
      const row = parseRow(trimmed, header)
      if (row) rows.push(row)
      continue
    }

    // Unix-domain sections and section titles end the current table.
    if (!lower.startsWith('active')) header = null
  }

  return rows
}

function readHeader(line: string): HeaderLayout | null {
  const columns = line
    .toLowerCase()
    .replace(/\(state\)/g, 'state')
    .replace(/local address/g, 'local_address')
    .replace(/foreign address/g, 'foreign_address')
    .replace(/pid\/program name/g, 'pid/program_name')
    .replace(/process name/g, 'process_name')
    .replace(/\s+/g, ' ')
    .trim()
    .split(' ')

  if (!columns.includes('local_address') || !columns.includes('foreign_address')) {
    return null
  }
  return columns
}

function parseRow(line: string, header: HeaderLayout): SocketRow | null {
  const columns = line.split(/\s+/)
  const protocolToken = columns[header.indexOf('proto')]?.toUpperCase() ?? ''
  const protocol = protocolToken.startsWith('TCP')
    ? 'TCP'
    : protocolToken.startsWith('UDP')
      ? 'UDP'
      : null
  if (!protocol) return null

  const stateIndex = header.indexOf('state')
  // UDP rows usually leave the state column empty.
  if (protocol === 'UDP' && stateIndex !== -1 && columns.length === header.length - 1) {
    columns.splice(stateIndex, 0, '')
  }

  const localRaw = columns[header.indexOf('local_address')]
  const remoteRaw = columns[header.indexOf('foreign_address')]
  if (!localRaw || !remoteRaw) return null

  const state = stateIndex !== -1 ? columns[stateIndex]?.replace(/[()]/g, '') : undefined
  const pidIndex = header.findIndex((column) => column.includes('pid'))

  return {
    protocol,
    local: parseEndpoint(localRaw),
    remote: parseEndpoint(remoteRaw),
    state: state ? state : undefined,
    pid: pidIndex === -1 ? undefined : extractPid(columns, pidIndex, header[pidIndex])
  }
}

function extractPid(columns: string[], pidIndex: number, label: string): number | undefined {
  const raw = columns[pidIndex]
  if (!raw) return undefined

  if (label === 'pid/program_name') {
    return parsePid(raw.split('/')[0])
  }

  if (label === 'process:pid') {
    for (let idx = pidIndex; idx < columns.length; idx += 1) {
      const match = /:(\d+)$/.exec(columns[idx])
      if (match) return parsePid(match[1])
    }
    return undefined
  }

  return parsePid(raw)
}

function parsePid(value: string | undefined): number | undefined {
  if (!value) return undefined
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? undefined : parsed
}

export function parseEndpoint(raw: string): SocketEndpoint {
  if (raw === '*:*' || raw === '*.*' || raw === '*') return { address: '*' }

  if (raw.startsWith('[') && raw.includes(']')) {
    const closing = raw.indexOf(']')
    const address = raw.slice(1, closing)
    const match = /[.:](\d+)$/.exec(raw.slice(closing + 1))
    return match ? { address, port: Number.parseInt(match[1], 10) } : { address }
  }

  const portMatch = /[.:](\d+)$/.exec(raw)
  if (portMatch) {
    const address = raw.slice(0, raw.length - portMatch[0].length)
    return { address: address || undefined, port: Number.parseInt(portMatch[1], 10) }
  }

  if (raw.endsWith(':*') || raw.endsWith('.*')) {
    return { address: raw.slice(0, -2) || '*' }
  }

  return { address: raw }
}
