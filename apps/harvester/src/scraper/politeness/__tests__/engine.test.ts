import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { CancelledError } from '../../errors.js'
import { PolitenessEngine } from '../engine.js'
import { isWithinOffPeak, parseClock } from '../off-peak.js'

const AGENT = 'BidwatchBot/1.0'

describe('off-peak window', () => {
  it('parses HH:MM clock times', () => {
    expect(parseClock('06:30')).toBe(390)
    expect(() => parseClock('25:00')).toThrow('Invalid clock time')
  })

  it('wraps midnight when start is after end', () => {
    const window = { start: '23:00', end: '06:00' }
    expect(isWithinOffPeak(window, new Date(2026, 0, 15, 23, 30))).toBe(true)
    expect(isWithinOffPeak(window, new Date(2026, 0, 15, 3, 0))).toBe(true)
    expect(isWithinOffPeak(window, new Date(2026, 0, 15, 12, 0))).toBe(false)
  })

  it('handles same-day windows', () => {
    const window = { start: '09:00', end: '17:00' }
    expect(isWithinOffPeak(window, new Date(2026, 0, 15, 9, 0))).toBe(true)
    expect(isWithinOffPeak(window, new Date(2026, 0, 15, 18, 0))).toBe(false)
  })
})

describe('PolitenessEngine', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date(2026, 0, 15, 12, 0, 0))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('spaces concurrent requests to one domain by the minimum interval', async () => {
    const engine = new PolitenessEngine({ userAgent: AGENT, requestDelaySeconds: 3, respectRobotsTxt: false })
    const issued: number[] = []

    const turns = ['a', 'b', 'c', 'd'].map((path) =>
      engine.awaitTurn(`https://bids.example.gov/${path}`).then((delay) => {
        issued.push(Date.now())
        return delay
      })
    )

    await vi.advanceTimersByTimeAsync(10_000)
    const delays = await Promise.all(turns)

    expect(issued).toHaveLength(4)
    for (let i = 1; i < issued.length; i++) {
      expect(issued[i] - issued[i - 1]).toBeGreaterThanOrEqual(3000)
    }
    expect(delays).toEqual([0, 3, 3, 3])
  })

  it('shares the budget across subdomains of one registrable domain', async () => {
    const engine = new PolitenessEngine({ userAgent: AGENT, requestDelaySeconds: 2, respectRobotsTxt: false })

    await engine.awaitTurn('https://www.example.gov/')
    const second = engine.awaitTurn('https://bids.example.gov/')
    await vi.advanceTimersByTimeAsync(2000)

    expect(await second).toBe(2)
  })

  it('does not delay different domains', async () => {
    const engine = new PolitenessEngine({ userAgent: AGENT, requestDelaySeconds: 5, respectRobotsTxt: false })

    expect(await engine.awaitTurn('https://one.example.gov/')).toBe(0)
    expect(await engine.awaitTurn('https://another.example.org/')).toBe(0)
  })

  it('halves the interval inside the off-peak window', async () => {
    vi.setSystemTime(new Date(2026, 0, 15, 23, 30, 0))
    const engine = new PolitenessEngine({ userAgent: AGENT, requestDelaySeconds: 3, respectRobotsTxt: false })

    await engine.awaitTurn('https://bids.example.gov/a')
    const second = engine.awaitTurn('https://bids.example.gov/b')
    await vi.advanceTimersByTimeAsync(1500)

    expect(await second).toBe(1.5)
  })

  it('applies per-domain overrides', async () => {
    const engine = new PolitenessEngine({
      userAgent: AGENT,
      requestDelaySeconds: 3,
      domainOverrides: { 'slow.example.gov': 10 },
      respectRobotsTxt: false,
    })

    expect(engine.getRequiredInterval('https://www.slow.example.gov/x')).toBe(10)
    expect(engine.getRequiredInterval('https://fast.example.gov/x')).toBe(3)
  })

  it('raises the interval to a robots.txt crawl-delay', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('User-agent: *\nCrawl-delay: 8', { status: 200 }))
    const engine = new PolitenessEngine({ userAgent: AGENT, requestDelaySeconds: 3, fetchImpl })

    await engine.awaitTurn('https://bids.example.gov/a')

    expect(engine.getRequiredInterval('https://bids.example.gov/b')).toBe(8)
  })

  it('answers allowed() from robots.txt and skips it when compliance is off', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('User-agent: *\nDisallow: /private', { status: 200 }))
    const strict = new PolitenessEngine({ userAgent: AGENT, fetchImpl })
    const lax = new PolitenessEngine({ userAgent: AGENT, respectRobotsTxt: false, fetchImpl })

    expect(await strict.allowed('https://x.example.gov/private')).toBe(false)
    expect(await lax.allowed('https://x.example.gov/private')).toBe(true)
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })

  it('rejects a waiting caller with CancelledError when aborted', async () => {
    const engine = new PolitenessEngine({ userAgent: AGENT, requestDelaySeconds: 30, respectRobotsTxt: false })
    const controller = new AbortController()

    await engine.awaitTurn('https://bids.example.gov/a')
    const waiting = engine.awaitTurn('https://bids.example.gov/b', controller.signal)
    const outcome = waiting.catch((error: unknown) => error)

    await vi.advanceTimersByTimeAsync(1000)
    controller.abort()

    expect(await outcome).toBeInstanceOf(CancelledError)
  })

  it('reports stats and overrides', async () => {
    const engine = new PolitenessEngine({ userAgent: AGENT, requestDelaySeconds: 3, respectRobotsTxt: false })

    await engine.awaitTurn('https://bids.example.gov/a')
    engine.setDomainDelay('other.example.gov', 7)

    expect(engine.getStats()).toEqual({
      cachedRobotsDomains: [],
      domainDelays: { 'other.example.gov': 7, 'example.gov': 3 },
      lastRequestTimes: { 'example.gov': new Date(2026, 0, 15, 12, 0, 0).toISOString() },
      offPeakHours: { start: '23:00', end: '06:00' },
      respectRobotsTxt: false,
    })
  })

  it('rejects negative domain delays', () => {
    const engine = new PolitenessEngine({ userAgent: AGENT, respectRobotsTxt: false })
    expect(() => engine.setDomainDelay('example.gov', -1)).toThrow(RangeError)
  })
})
