import { describe, it, expect, vi } from 'vitest'
import { InMemoryAuditSink } from '../audit.js'
import {
  AutomationError,
  CancelledError,
  PermanentRequestError,
  RobotsDisallowedError,
  TransientNetworkError,
} from '../errors.js'
import { BrowserPool } from '../fetch/browser-pool.js'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { Transport } from '../fetch/transport.js'
import { UserAgentRotator } from '../fetch/user-agents.js'
import { PolitenessEngine } from '../politeness/engine.js'
import { FakePage, createFakeBrowser } from './fakes.js'

const AGENT = 'BidwatchBot/1.0 (+https://example.org/bot)'
const URL_A = 'https://bids.example.gov/solicitations'

function setup(options: {
  fetchImpl: (input: string, init?: RequestInit) => Promise<Response>
  robotsFetch?: (input: string, init?: RequestInit) => Promise<Response>
  maxRetries?: number
  retryBaseDelayMs?: number
  realSleep?: boolean
  browser?: BrowserPool
  pool?: string[]
}) {
  const politeness = new PolitenessEngine({
    userAgent: AGENT,
    requestDelaySeconds: 0,
    respectRobotsTxt: options.robotsFetch !== undefined,
    fetchImpl: options.robotsFetch,
  })
  const audit = new InMemoryAuditSink()
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {})
  const transport = new Transport({
    politeness,
    audit,
    http: new HttpFetcher({ fetchImpl: options.fetchImpl }),
    userAgents: new UserAgentRotator(AGENT, options.pool ?? []),
    browser: options.browser,
    retry: { maxRetries: options.maxRetries ?? 3, retryBaseDelayMs: options.retryBaseDelayMs ?? 1000 },
    sleep: options.realSleep ? undefined : sleep,
  })
  return { transport, audit, sleep, politeness }
}

describe('Transport', () => {
  it('returns the response and audits one successful attempt', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('{"items":[]}', { status: 200 }))
    const { transport, audit } = setup({ fetchImpl })

    const response = await transport.fetch(URL_A, 'http', { strategyName: 'export', portal: 'esbd' })

    expect(response).toMatchObject({ status: 200, body: '{"items":[]}', backend: 'http', attempts: 1 })
    const attempts = audit.list()
    expect(attempts).toHaveLength(1)
    expect(attempts[0]).toMatchObject({
      url: URL_A,
      portal: 'esbd',
      strategyName: 'export',
      backend: 'http',
      httpStatus: 200,
      succeeded: true,
      errorKind: null,
      userAgent: AGENT,
      robotsTxtRespected: false,
      appliedDelaySeconds: 0,
      attempt: 0,
    })
    expect(Object.isFrozen(attempts[0])).toBe(true)
  })

  it('retries transient failures exactly maxRetries times with increasing backoff', async () => {
    const fetchImpl = vi.fn().mockImplementation(() => Promise.resolve(new Response('unavailable', { status: 503 })))
    const { transport, audit, sleep } = setup({ fetchImpl, maxRetries: 3, retryBaseDelayMs: 1000 })

    const error = await transport.fetch(URL_A, 'http', { strategyName: 'graphql' }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(TransientNetworkError)
    expect(fetchImpl).toHaveBeenCalledTimes(4)
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000])
    expect(audit.list().map((attempt) => [attempt.attempt, attempt.errorKind, attempt.httpStatus])).toEqual([
      [0, 'transient_network', 503],
      [1, 'transient_network', 503],
      [2, 'transient_network', 503],
      [3, 'transient_network', 503],
    ])
  })

  it('caps backoff at maxBackoffMs', () => {
    const politeness = new PolitenessEngine({ userAgent: AGENT, respectRobotsTxt: false })
    const transport = new Transport({
      politeness,
      retry: { retryBaseDelayMs: 1000, maxBackoffMs: 5000 },
    })

    expect([0, 1, 2, 3, 4].map((n) => transport.backoffDelay(n))).toEqual([1000, 2000, 4000, 5000, 5000])
  })

  it('recovers when a retry succeeds', async () => {
    const fetchImpl = vi
      .fn()
      .mockResolvedValueOnce(new Response('fail', { status: 500 }))
      .mockResolvedValueOnce(new Response('<html>ok</html>', { status: 200 }))
    const { transport, audit } = setup({ fetchImpl })

    const response = await transport.fetch(URL_A, 'http', { strategyName: 'static-html' })

    expect(response.attempts).toBe(2)
    expect(audit.list().map((attempt) => attempt.succeeded)).toEqual([false, true])
  })

  it('retries connection failures', async () => {
    const fetchImpl = vi
      .fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }))
    const { transport } = setup({ fetchImpl })

    const response = await transport.fetch(URL_A, 'http', { strategyName: 'static-html' })
    expect(response.body).toBe('ok')
  })

  it('does not retry permanent failures', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('gone', { status: 404 }))
    const { transport, sleep } = setup({ fetchImpl })

    await expect(transport.fetch(URL_A, 'http', { strategyName: 'export' })).rejects.toBeInstanceOf(
      PermanentRequestError
    )
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('refuses robots-disallowed URLs without touching the network', async () => {
    const fetchImpl = vi.fn()
    const robotsFetch = vi.fn().mockResolvedValue(new Response('User-agent: *\nDisallow: /private', { status: 200 }))
    const { transport, audit } = setup({ fetchImpl, robotsFetch })

    await expect(
      transport.fetch('https://bids.example.gov/private/list', 'http', { strategyName: 'static-html' })
    ).rejects.toBeInstanceOf(RobotsDisallowedError)

    expect(fetchImpl).not.toHaveBeenCalled()
    expect(audit.list()).toEqual([
      expect.objectContaining({
        errorKind: 'robots_disallowed',
        httpStatus: null,
        succeeded: false,
        robotsTxtRespected: true,
      }),
    ])
  })

  it('rotates user agents while robots.txt is evaluated for the declared agent', async () => {
    const fetchImpl = vi.fn().mockImplementation(() => Promise.resolve(new Response('ok', { status: 200 })))
    const robotsFetch = vi.fn().mockResolvedValue(new Response('', { status: 404 }))
    const { transport } = setup({ fetchImpl, robotsFetch, pool: ['Mozilla/5.0 Test'] })

    for (let i = 0; i < 3; i++) {
      await transport.fetch(URL_A, 'http', { strategyName: 'static-html' })
    }

    const sent = fetchImpl.mock.calls.map((call: unknown[]) => {
      const init = call[1]
      if (typeof init !== 'object' || init === null || !('headers' in init)) return undefined
      const headers = init.headers
      return typeof headers === 'object' && headers !== null && 'User-Agent' in headers ? headers['User-Agent'] : undefined
    })
    expect(sent).toEqual([AGENT, 'Mozilla/5.0 Test', AGENT])
    expect(robotsFetch).toHaveBeenCalledWith(
      'https://bids.example.gov/robots.txt',
      expect.objectContaining({ headers: expect.objectContaining({ 'User-Agent': AGENT }) })
    )
  })

  it('keeps fetching when the audit sink throws', async () => {
    const politeness = new PolitenessEngine({ userAgent: AGENT, requestDelaySeconds: 0, respectRobotsTxt: false })
    const transport = new Transport({
      politeness,
      http: new HttpFetcher({ fetchImpl: vi.fn().mockResolvedValue(new Response('ok', { status: 200 })) }),
      audit: {
        record: () => {
          throw new Error('disk full')
        },
      },
    })

    await expect(transport.fetch(URL_A, 'http', { strategyName: 'export' })).resolves.toMatchObject({ body: 'ok' })
  })

  it('stops backing off as soon as the run is cancelled', async () => {
    const fetchImpl = vi.fn().mockImplementation(() => Promise.resolve(new Response('down', { status: 502 })))
    const { transport } = setup({ fetchImpl, retryBaseDelayMs: 10_000, realSleep: true })
    const controller = new AbortController()

    const started = Date.now()
    const pending = transport.fetch(URL_A, 'http', { strategyName: 'graphql', signal: controller.signal })
    setTimeout(() => controller.abort(), 20)

    await expect(pending).rejects.toBeInstanceOf(CancelledError)
    expect(Date.now() - started).toBeLessThan(5000)
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })

  it('renders pages through the browser pool', async () => {
    const fake = createFakeBrowser(() => new FakePage(['<html><li>Bid</li></html>']))
    const browser = new BrowserPool({ poolSize: 1, launcher: fake.launcher })
    const { transport, audit } = setup({ fetchImpl: vi.fn(), browser })

    const response = await transport.fetch(URL_A, 'browser', {
      strategyName: 'rendered-dom',
      waitForSelector: 'li',
    })

    expect(response).toMatchObject({ status: 200, body: '<html><li>Bid</li></html>', backend: 'browser' })
    expect(fake.pages[0].closed).toBe(true)
    expect(fake.pages[0].userAgent).toBe(AGENT)
    expect(browser.stats().inUse).toBe(0)
    expect(audit.list()[0]).toMatchObject({ backend: 'browser', succeeded: true })
  })

  it('does not retry browser failures', async () => {
    const fake = createFakeBrowser(() => new FakePage([], { failOn: 'goto' }))
    const browser = new BrowserPool({ poolSize: 1, launcher: fake.launcher })
    const { transport } = setup({ fetchImpl: vi.fn(), browser })

    await expect(transport.fetch(URL_A, 'browser', { strategyName: 'rendered-dom' })).rejects.toBeInstanceOf(
      AutomationError
    )
    expect(fake.pages).toHaveLength(1)
    expect(fake.pages[0].closed).toBe(true)
  })

  it('fails the browser backend when it is not enabled', async () => {
    const { transport } = setup({ fetchImpl: vi.fn() })

    await expect(transport.fetch(URL_A, 'browser', { strategyName: 'rendered-dom' })).rejects.toThrow(
      'Browser backend is not enabled'
    )
  })

  it('runs automation sessions on a pooled page and audits every page turn', async () => {
    const fake = createFakeBrowser(() => new FakePage(['<p>1</p>', '<p>2</p>', '<p>3</p>'], { nextSelector: '.next' }))
    const browser = new BrowserPool({ poolSize: 1, launcher: fake.launcher })
    const { transport, audit } = setup({ fetchImpl: vi.fn(), browser })

    const pages = await transport.automate(
      URL_A,
      { strategyName: 'browser-automation', portal: 'esbd' },
      async ({ page, navigate }) => {
        const seen = [await page.content()]
        while (await page.isVisible('.next')) {
          await navigate(() => page.click('.next', { timeoutMs: 1000 }))
          seen.push(await page.content())
        }
        return seen
      }
    )

    expect(pages).toEqual(['<p>1</p>', '<p>2</p>', '<p>3</p>'])
    expect(fake.pages[0].closed).toBe(true)
    expect(audit.list().map((attempt) => [attempt.url, attempt.httpStatus, attempt.succeeded])).toEqual([
      [URL_A, 200, true],
      [URL_A, null, true],
      [URL_A, null, true],
    ])
    expect(audit.list().every((attempt) => attempt.portal === 'esbd' && attempt.backend === 'browser')).toBe(true)
  })

  it('audits a failed page turn once', async () => {
    class StuckPage extends FakePage {
      async click(): Promise<void> {
        throw new Error('element is not attached to the DOM')
      }
    }
    const fake = createFakeBrowser(() => new StuckPage(['<p>1</p>', '<p>2</p>'], { nextSelector: '.next' }))
    const browser = new BrowserPool({ poolSize: 1, launcher: fake.launcher })
    const { transport, audit } = setup({ fetchImpl: vi.fn(), browser })

    await expect(
      transport.automate(URL_A, { strategyName: 'browser-automation' }, async ({ page, navigate }) => {
        await navigate(() => page.click('.next', { timeoutMs: 1000 }))
      })
    ).rejects.toBeInstanceOf(AutomationError)

    expect(audit.list().map((attempt) => [attempt.succeeded, attempt.errorMessage])).toEqual([
      [true, null],
      [false, 'Browser failure: element is not attached to the DOM'],
    ])
  })
})
