import { describe, expect, it, vi } from 'vitest'
import { LIMITED_PERMISSIONS_WARNING } from '@config/constants'
import { ConnectionCountEstimator } from '@main/core/network/network-io-estimator'
import { NetworkSampler, summarizeBandwidth } from '@main/core/network/network-sampler'
import { ProcessInfoResolver } from '@main/core/network/process-info-resolver'
import { logger } from '@infra/logging'
import { ProcessUnavailableError } from '@shared/errors'
import type { ActiveConnectionCount, Snapshot } from '@shared/interfaces/common'
import { FakeProcessProvider } from '../../../../helpers/fake-process-provider'

vi.mock('@infra/logging', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn()
  }
}))

function nextSnapshot(sampler: NetworkSampler): Promise<Snapshot> {
  return new Promise((resolve) => {
    const unsubscribe = sampler.subscribe((snapshot) => {
      unsubscribe()
      resolve(snapshot)
    })
  })
}

describe('NetworkSampler.captureSnapshot', () => {
  it('reports zero deltas for first-seen processes and clamps negative deltas', async () => {
    const provider = new FakeProcessProvider()
      .set(1, { name: 'chrome', counters: { bytesSent: 1000, bytesRecv: 2000 }, connectionCount: 2 })
      .set(2, { name: 'spotify', counters: { bytesSent: 500, bytesRecv: 500 }, connectionCount: 1 })
    const sampler = new NetworkSampler(provider)

    const first = await sampler.captureSnapshot()
    expect(first.get(1)).toEqual({
      pid: 1,
      processName: 'chrome',
      appName: 'Google Chrome',
      bytesSent: 0,
      bytesRecv: 0,
      connectionCount: 2
    })

    provider.setCounters(1, 1500, 2600)
    provider.setCounters(2, 400, 900)
    const second = await sampler.captureSnapshot()

    expect(second.get(1)).toMatchObject({ bytesSent: 500, bytesRecv: 600 })
    expect(second.get(2)).toMatchObject({ appName: 'Spotify', bytesSent: 0, bytesRecv: 400 })
  })

  it('skips entries without open connections', async () => {
    const provider = new FakeProcessProvider().set(1, {
      name: 'chrome',
      counters: { bytesSent: 0, bytesRecv: 0 },
      connectionCount: 1
    })
    provider.enumerateActiveConnections.mockResolvedValueOnce([
      { pid: 3, connectionCount: 0 },
      { pid: 1, connectionCount: 1 }
    ])
    const sampler = new NetworkSampler(provider)

    const snapshot = await sampler.captureSnapshot()

    expect(Array.from(snapshot.keys())).toEqual([1])
    expect(provider.getCumulativeIo).not.toHaveBeenCalledWith(3)
  })

  it('falls back to the estimator when no counters are available', async () => {
    const provider = new FakeProcessProvider().set(7, { name: 'steam', connectionCount: 2 })
    const sampler = new NetworkSampler(provider)

    await sampler.captureSnapshot()
    const second = await sampler.captureSnapshot()

    expect(second.get(7)).toMatchObject({ appName: 'Steam', bytesSent: 2048, bytesRecv: 2048 })
  })

  it('forgets processes that disappear between ticks', async () => {
    const provider = new FakeProcessProvider()
      .set(1, { name: 'chrome', counters: { bytesSent: 100, bytesRecv: 100 }, connectionCount: 1 })
      .set(2, { name: 'discord', connectionCount: 1 })
    const resolver = new ProcessInfoResolver(provider)
    const estimator = new ConnectionCountEstimator()
    const invalidate = vi.spyOn(resolver, 'invalidate')
    const sampler = new NetworkSampler(provider, { resolver, estimator })

    await sampler.captureSnapshot()
    provider.remove(2)
    await sampler.captureSnapshot()

    expect(invalidate).toHaveBeenCalledTimes(1)
    expect(invalidate).toHaveBeenCalledWith(2)
    expect(estimator.trackedCount).toBe(0)

    // Reused pid: new process, new baseline.
    provider.set(2, { name: 'zoom', counters: { bytesSent: 9000, bytesRecv: 9000 }, connectionCount: 1 })
    const snapshot = await sampler.captureSnapshot()

    expect(snapshot.get(2)).toMatchObject({ appName: 'Zoom', bytesSent: 0, bytesRecv: 0 })
  })

  it('skips a process whose counters cannot be read', async () => {
    const provider = new FakeProcessProvider()
      .set(1, { name: 'chrome', connectionCount: 1 })
      .set(2, { name: 'secret-agent', connectionCount: 1 })
    provider.getCumulativeIo.mockImplementation(async (pid: number) => {
      if (pid === 2) throw new ProcessUnavailableError(2, 'access-denied')
      return { bytesSent: 10, bytesRecv: 10 }
    })
    const sampler = new NetworkSampler(provider)

    const snapshot = await sampler.captureSnapshot()

    expect(Array.from(snapshot.keys())).toEqual([1])
    expect(logger.debug).toHaveBeenCalledWith(
      'Skipping PID 2 for this sample',
      expect.any(ProcessUnavailableError)
    )
  })

  it('latches the limited permissions warning once', async () => {
    const sampler = new NetworkSampler(new FakeProcessProvider())
    expect(sampler.permissionsWarning).toBeNull()

    await sampler.captureSnapshot()
    await sampler.captureSnapshot()

    expect(sampler.permissionsWarning).toBe(LIMITED_PERMISSIONS_WARNING)
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.warn).toHaveBeenCalledWith(LIMITED_PERMISSIONS_WARNING)
  })

  it('produces frozen entries', async () => {
    const provider = new FakeProcessProvider().set(1, { name: 'chrome', connectionCount: 1 })
    const sampler = new NetworkSampler(provider)

    const snapshot = await sampler.captureSnapshot()

    expect(Object.isFrozen(snapshot.get(1))).toBe(true)
  })
})

describe('NetworkSampler loop', () => {
  function createProvider(): FakeProcessProvider {
    return new FakeProcessProvider()
      .set(1, { name: 'chrome', counters: { bytesSent: 0, bytesRecv: 0 }, connectionCount: 1 })
      .set(2, { name: 'steam', counters: { bytesSent: 0, bytesRecv: 0 }, connectionCount: 1 })
      .set(3, { name: 'slack', counters: { bytesSent: 0, bytesRecv: 0 }, connectionCount: 1 })
  }

  it('publishes snapshots and answers queries from the latest one', async () => {
    vi.useFakeTimers()
    const provider = createProvider()
    const sampler = new NetworkSampler(provider, { intervalMs: 1000 })

    const first = nextSnapshot(sampler)
    sampler.start()
    await vi.advanceTimersByTimeAsync(0)
    await first

    provider.setCounters(1, 100, 300)
    provider.setCounters(2, 1000, 0)
    provider.setCounters(3, 0, 50)
    const second = nextSnapshot(sampler)
    await vi.advanceTimersByTimeAsync(1000)
    await second

    expect(sampler.totalBandwidth()).toEqual({ bytesSent: 1100, bytesRecv: 350, total: 1450 })
    expect(sampler.topProcesses(2).map((entry) => [entry.pid, entry.total])).toEqual([
      [2, 1000],
      [1, 400]
    ])

    const copy = sampler.latestSnapshot()
    copy.delete(1)
    expect(sampler.latestSnapshot().size).toBe(3)

    await sampler.stop()
  })

  it('keeps notifying other listeners when one fails', async () => {
    vi.useFakeTimers()
    const sampler = new NetworkSampler(createProvider())
    const failing = vi.fn(() => {
      throw new Error('listener broke')
    })
    const rejecting = vi.fn(async () => {
      throw new Error('async listener broke')
    })
    sampler.subscribe(failing)
    sampler.subscribe(rejecting)
    const delivered = nextSnapshot(sampler)

    sampler.start()
    await vi.advanceTimersByTimeAsync(0)
    const snapshot = await delivered
    await vi.advanceTimersByTimeAsync(0)

    expect(snapshot.size).toBe(3)
    expect(failing).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledWith('Snapshot listener failed', expect.any(Error))
    expect(logger.error).toHaveBeenCalledWith('Snapshot listener rejected', expect.any(Error))

    await sampler.stop()
  })

  it('stops delivering after unsubscribe', async () => {
    vi.useFakeTimers()
    const sampler = new NetworkSampler(createProvider(), { intervalMs: 1000 })
    const listener = vi.fn()
    const unsubscribe = sampler.subscribe(listener)
    const first = nextSnapshot(sampler)

    sampler.start()
    await vi.advanceTimersByTimeAsync(0)
    await first
    unsubscribe()
    const second = nextSnapshot(sampler)
    await vi.advanceTimersByTimeAsync(1000)
    await second

    expect(listener).toHaveBeenCalledTimes(1)
    await sampler.stop()
  })

  it('retries after a failed tick', async () => {
    vi.useFakeTimers()
    const provider = createProvider()
    provider.enumerateActiveConnections.mockRejectedValueOnce(new Error('netstat timed out'))
    const sampler = new NetworkSampler(provider, { intervalMs: 1000 })

    sampler.start()
    await vi.advanceTimersByTimeAsync(0)
    await vi.advanceTimersByTimeAsync(1000)

    expect(logger.error).toHaveBeenCalledWith('Network sampling failed', expect.any(Error))
    expect(provider.enumerateActiveConnections).toHaveBeenCalledTimes(2)

    await sampler.stop()
  })

  it('warns when started twice', () => {
    vi.useFakeTimers()
    const sampler = new NetworkSampler(createProvider())

    sampler.start()
    sampler.start()

    expect(logger.warn).toHaveBeenCalledWith('Network sampler already running')
    expect(sampler.isRunning).toBe(true)
  })

  it('gives up waiting for a stuck tick after the join timeout', async () => {
    vi.useFakeTimers()
    const provider = createProvider()
    provider.enumerateActiveConnections.mockReturnValue(new Promise<ActiveConnectionCount[]>(() => undefined))
    const sampler = new NetworkSampler(provider, { intervalMs: 1000, joinTimeoutMs: 5000 })

    sampler.start()
    await vi.advanceTimersByTimeAsync(0)
    const stopping = sampler.stop()
    await vi.advanceTimersByTimeAsync(5000)
    await stopping

    expect(logger.warn).toHaveBeenCalledWith('Sampling tick still running after 5000ms, not waiting')
    expect(sampler.isRunning).toBe(false)
    await vi.advanceTimersByTimeAsync(10_000)
    expect(provider.enumerateActiveConnections).toHaveBeenCalledTimes(1)
  })

  it('keeps a single loop when restarted while an abandoned tick is still running', async () => {
    vi.useFakeTimers()
    const provider = createProvider()
    let release: (connections: ActiveConnectionCount[]) => void = () => undefined
    provider.enumerateActiveConnections.mockReturnValueOnce(
      new Promise<ActiveConnectionCount[]>((resolve) => {
        release = resolve
      })
    )
    const sampler = new NetworkSampler(provider, { intervalMs: 1000, joinTimeoutMs: 5000 })

    sampler.start()
    await vi.advanceTimersByTimeAsync(0)
    const stopping = sampler.stop()
    await vi.advanceTimersByTimeAsync(5000)
    await stopping

    sampler.start()
    await vi.advanceTimersByTimeAsync(3000)
    expect(provider.enumerateActiveConnections).toHaveBeenCalledTimes(1)

    release([{ pid: 1, connectionCount: 1 }])
    await vi.advanceTimersByTimeAsync(9500)

    // Restarted loop ticks at +0s through +9s; the abandoned tick never reschedules.
    expect(provider.enumerateActiveConnections).toHaveBeenCalledTimes(11)

    await sampler.stop()
    await vi.advanceTimersByTimeAsync(5000)
    expect(provider.enumerateActiveConnections).toHaveBeenCalledTimes(11)
  })

  it('stop is a no-op when not running', async () => {
    const sampler = new NetworkSampler(createProvider())

    await sampler.stop()

    expect(logger.info).not.toHaveBeenCalled()
  })
})

describe('summarizeBandwidth', () => {
  it('sums both directions', () => {
    const snapshot = new Map([
      [1, { pid: 1, processName: 'a', appName: 'A', bytesSent: 10, bytesRecv: 5, connectionCount: 1 }],
      [2, { pid: 2, processName: 'b', appName: 'B', bytesSent: 1, bytesRecv: 2, connectionCount: 1 }]
    ])

    expect(summarizeBandwidth(snapshot)).toEqual({ bytesSent: 11, bytesRecv: 7, total: 18 })
    expect(summarizeBandwidth(new Map())).toEqual({ bytesSent: 0, bytesRecv: 0, total: 0 })
  })
})
