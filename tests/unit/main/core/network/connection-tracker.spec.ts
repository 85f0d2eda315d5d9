import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { SocketRow } from '@main/core/network/netstat-runner'
import { listSockets } from '@main/core/network/netstat-runner'
import { ConnectionTracker, countActiveConnections } from '@main/core/network/connection-tracker'

vi.mock('@main/core/network/netstat-runner', () => ({
  listSockets: vi.fn()
}))

vi.mock('@infra/logging', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn()
  }
}))

function tcp(pid: number | undefined, local: string, remote: string, state: string): SocketRow {
  return {
    protocol: 'TCP',
    local: { address: local, port: 50000 },
    remote: { address: remote, port: 443 },
    state,
    pid
  }
}

function udp(pid: number, remote: string | undefined, remotePort?: number): SocketRow {
  return {
    protocol: 'UDP',
    local: { address: '192.168.1.20', port: 40000 },
    remote: { address: remote, port: remotePort },
    pid
  }
}

describe('countActiveConnections', () => {
  it('counts active TCP states per pid', () => {
    const counts = countActiveConnections([
      tcp(10, '192.168.1.20', '203.0.113.10', 'ESTABLISHED'),
      tcp(10, '192.168.1.20', '203.0.113.11', 'CLOSE_WAIT'),
      tcp(10, '192.168.1.20', '203.0.113.12', 'TIME_WAIT'),
      tcp(20, '192.168.1.20', '203.0.113.13', 'SYN_SENT'),
      tcp(30, '0.0.0.0', '0.0.0.0', 'LISTEN')
    ])

    expect(counts).toEqual([
      { pid: 10, connectionCount: 2 },
      { pid: 20, connectionCount: 1 }
    ])
  })

  it('skips loopback sockets on either side', () => {
    const counts = countActiveConnections([
      tcp(10, '127.0.0.1', '203.0.113.10', 'ESTABLISHED'),
      tcp(10, '192.168.1.20', '127.0.0.53', 'ESTABLISHED'),
      tcp(10, '::1', '2001:db8::1', 'ESTABLISHED'),
      tcp(10, '0:0:0:0:0:0:0:1', '2001:db8::1', 'ESTABLISHED'),
      tcp(10, '::ffff:127.0.0.1', '2001:db8::1', 'ESTABLISHED')
    ])

    expect(counts).toEqual([])
  })

  it('counts UDP sockets only when bound to a concrete peer', () => {
    const counts = countActiveConnections([
      udp(40, '0.0.0.0'),
      udp(40, '*'),
      udp(40, '::', 0),
      udp(40, undefined),
      udp(40, '192.168.1.1', 53)
    ])

    expect(counts).toEqual([{ pid: 40, connectionCount: 1 }])
  })

  it('ignores rows without a usable pid', () => {
    const counts = countActiveConnections([
      tcp(undefined, '192.168.1.20', '203.0.113.10', 'ESTABLISHED'),
      tcp(0, '192.168.1.20', '203.0.113.10', 'ESTABLISHED')
    ])

    expect(counts).toEqual([])
  })
})

describe('ConnectionTracker', () => {
  beforeEach(() => {
    vi.mocked(listSockets).mockReset()
  })

  it('shares one netstat run between concurrent callers', async () => {
    let release: (rows: SocketRow[]) => void = () => undefined
    vi.mocked(listSockets).mockImplementation(
      () =>
        new Promise<SocketRow[]>((resolve) => {
          release = resolve
        })
    )

    const tracker = new ConnectionTracker(2000)
    const first = tracker.refreshConnections()
    const second = tracker.refreshConnections()
    release([tcp(10, '192.168.1.20', '203.0.113.10', 'ESTABLISHED')])

    await expect(first).resolves.toEqual([{ pid: 10, connectionCount: 1 }])
    await expect(second).resolves.toEqual([{ pid: 10, connectionCount: 1 }])
    expect(listSockets).toHaveBeenCalledTimes(1)
    expect(listSockets).toHaveBeenCalledWith(2000)
  })

  it('runs netstat again once the previous scan settled', async () => {
    vi.mocked(listSockets).mockResolvedValue([])
    const tracker = new ConnectionTracker()

    await tracker.refreshConnections()
    await tracker.refreshConnections()

    expect(listSockets).toHaveBeenCalledTimes(2)
  })

  it('propagates netstat failures', async () => {
    vi.mocked(listSockets).mockRejectedValue(new Error('netstat timed out'))
    const tracker = new ConnectionTracker()

    await expect(tracker.refreshConnections()).rejects.toThrow('netstat timed out')
  })
})
