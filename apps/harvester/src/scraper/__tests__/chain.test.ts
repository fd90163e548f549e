import { describe, it, expect } from 'vitest'
import { StrategyChain } from '../chain.js'
import { CancelledError, TransientNetworkError } from '../errors.js'
import { FakeStrategy, makeRecords } from './fakes.js'

const portal = { name: 'city', baseUrl: 'https://bids.example.gov', searchUrl: 'https://bids.example.gov/open' }

describe('StrategyChain', () => {
  it('falls through a failing and an empty strategy to the one with records', async () => {
    const failing = new FakeStrategy('graphql', async () => {
      throw new Error('boom')
    }, 10)
    const empty = new FakeStrategy('export', async () => [], 20)
    const working = new FakeStrategy('static-html', async () => makeRecords(5), 30)

    const result = await new StrategyChain([failing, empty, working]).acquire(portal, 10)

    expect(result.records).toHaveLength(5)
    expect(result.records.every((record) => record.sourceStrategy === 'static-html')).toBe(true)
    expect(result.strategyUsed).toBe('static-html')
    expect(result.outcomes.map((outcome) => [outcome.strategy, outcome.status])).toEqual([
      ['graphql', 'failed'],
      ['export', 'empty'],
      ['static-html', 'records'],
    ])
    expect(result.outcomes[0]).toMatchObject({ errorKind: 'permanent_request', error: 'boom' })
  })

  it('stops at the first strategy with records', async () => {
    const first = new FakeStrategy('export', async () => makeRecords(2), 10)
    const second = new FakeStrategy('static-html', async () => makeRecords(3), 20)

    const result = await new StrategyChain([first, second]).acquire(portal, 10)

    expect(result.strategyUsed).toBe('export')
    expect(second.calls).toBe(0)
  })

  it('runs strategies in priority order regardless of list order', async () => {
    const order: string[] = []
    const late = new FakeStrategy('late', async () => {
      order.push('late')
      return []
    }, 50)
    const early = new FakeStrategy('early', async () => {
      order.push('early')
      return []
    }, 5)

    await new StrategyChain([late, early]).acquire(portal, 10)

    expect(order).toEqual(['early', 'late'])
  })

  it('skips unavailable strategies without executing them', async () => {
    const browser = new FakeStrategy('rendered-dom', async () => makeRecords(1), 10, false)
    const html = new FakeStrategy('static-html', async () => makeRecords(1), 20)

    const result = await new StrategyChain([browser, html]).acquire(portal, 10)

    expect(browser.calls).toBe(0)
    expect(result.outcomes[0]).toEqual({ strategy: 'rendered-dom', status: 'unavailable', recordCount: 0, durationMs: 0 })
    expect(result.strategyUsed).toBe('static-html')
  })

  it('treats a throwing availability check as a failed strategy', async () => {
    class MissingBinary extends FakeStrategy {
      isAvailable(): boolean {
        throw new Error('chromium binary missing')
      }
    }
    const broken = new MissingBinary('rendered-dom', async () => makeRecords(1), 10)
    const html = new FakeStrategy('static-html', async () => makeRecords(2), 20)

    const result = await new StrategyChain([broken, html]).acquire(portal, 10)

    expect(broken.calls).toBe(0)
    expect(result.strategyUsed).toBe('static-html')
    expect(result.records).toHaveLength(2)
    expect(result.outcomes[0]).toEqual({
      strategy: 'rendered-dom',
      status: 'failed',
      recordCount: 0,
      durationMs: 0,
      errorKind: 'permanent_request',
      error: 'chromium binary missing',
    })
  })

  it('returns an empty result when every strategy is exhausted', async () => {
    const transient = new FakeStrategy('graphql', async () => {
      throw new TransientNetworkError('HTTP 503')
    })
    const empty = new FakeStrategy('static-html', async () => [])

    const result = await new StrategyChain([transient, empty]).acquire(portal, 10)

    expect(result.records).toEqual([])
    expect(result.strategyUsed).toBeNull()
    expect(result.outcomes[0]).toMatchObject({ status: 'failed', errorKind: 'transient_network', error: 'HTTP 503' })
  })

  it('lets cancellation escape', async () => {
    const cancelled = new FakeStrategy('graphql', async () => {
      throw new CancelledError()
    })
    const next = new FakeStrategy('static-html', async () => makeRecords(1), 20)

    await expect(new StrategyChain([cancelled, next]).acquire(portal, 10)).rejects.toBeInstanceOf(CancelledError)
    expect(next.calls).toBe(0)
  })

  it('checks the signal before each strategy', async () => {
    const controller = new AbortController()
    controller.abort()
    const strategy = new FakeStrategy('static-html', async () => makeRecords(1))

    await expect(new StrategyChain([strategy]).acquire(portal, 10, controller.signal)).rejects.toBeInstanceOf(
      CancelledError
    )
    expect(strategy.calls).toBe(0)
  })
})
