import { describe, it, expect, vi } from 'vitest'
import { CancelledError } from '../../errors.js'
import { agentToken, isPathAllowed, parseRobotsTxt, RobotsPolicy } from '../robots.js'

const AGENT = 'BidwatchBot/1.0 (+https://example.org/bot)'

describe('parseRobotsTxt', () => {
  it('uses the group naming our agent over the wildcard group', () => {
    const text = [
      'User-agent: *',
      'Disallow: /',
      '',
      'User-agent: bidwatchbot',
      'Disallow: /private',
      'Crawl-delay: 5',
    ].join('\n')

    const parsed = parseRobotsTxt(text, AGENT)

    expect(parsed.rules).toEqual([{ allow: false, pattern: '/private' }])
    expect(parsed.crawlDelaySeconds).toBe(5)
  })

  it('falls back to the wildcard group', () => {
    const parsed = parseRobotsTxt('User-agent: otherbot\nDisallow: /\n\nUser-agent: *\nDisallow: /admin', AGENT)
    expect(parsed.rules).toEqual([{ allow: false, pattern: '/admin' }])
    expect(parsed.crawlDelaySeconds).toBeNull()
  })

  it('matches the agent token exactly, not as a substring', () => {
    const text = ['User-agent: bot', 'Disallow: /', '', 'User-agent: *', 'Disallow: /admin'].join('\n')

    const parsed = parseRobotsTxt(text, AGENT)

    expect(parsed.rules).toEqual([{ allow: false, pattern: '/admin' }])
  })

  it('matches the agent token case-insensitively', () => {
    const parsed = parseRobotsTxt('User-agent: BidwatchBot/2.0\nDisallow: /drafts\n\nUser-agent: *\nDisallow: /', AGENT)
    expect(parsed.rules).toEqual([{ allow: false, pattern: '/drafts' }])
  })

  it('ignores comments and empty Disallow lines', () => {
    const parsed = parseRobotsTxt('# hello\nUser-agent: *\nDisallow:\nDisallow: /tmp # scratch', AGENT)
    expect(parsed.rules).toEqual([{ allow: false, pattern: '/tmp' }])
  })
})

describe('isPathAllowed', () => {
  const rules = [
    { allow: false, pattern: '/bids' },
    { allow: true, pattern: '/bids/open' },
    { allow: false, pattern: '/*.pdf$' },
  ]

  it('prefers the longest matching rule', () => {
    expect(isPathAllowed('/bids/closed', rules)).toBe(false)
    expect(isPathAllowed('/bids/open/123', rules)).toBe(true)
  })

  it('supports wildcards and end anchors', () => {
    expect(isPathAllowed('/docs/spec.pdf', rules)).toBe(false)
    expect(isPathAllowed('/docs/spec.pdf?download=1', rules)).toBe(true)
  })

  it('allows paths no rule matches', () => {
    expect(isPathAllowed('/', rules)).toBe(true)
  })

  it('lets Allow win a tie', () => {
    expect(isPathAllowed('/a', [{ allow: false, pattern: '/a' }, { allow: true, pattern: '/a' }])).toBe(true)
  })
})

describe('agentToken', () => {
  it('takes the lowercased product token', () => {
    expect(agentToken(AGENT)).toBe('bidwatchbot')
  })
})

describe('RobotsPolicy', () => {
  it('disallows a path listed in robots.txt', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('User-agent: *\nDisallow: /private', { status: 200 }))
    const policy = new RobotsPolicy({ userAgent: AGENT, fetchImpl })

    expect(await policy.isAllowed('https://x.example.gov/private')).toBe(false)
    expect(await policy.isAllowed('https://x.example.gov/public')).toBe(true)
    expect(fetchImpl).toHaveBeenCalledTimes(1)
    expect(fetchImpl).toHaveBeenCalledWith('https://x.example.gov/robots.txt', expect.objectContaining({ method: 'GET' }))
  })

  it('fails open when robots.txt is unreachable', async () => {
    const fetchImpl = vi.fn().mockRejectedValue(new TypeError('fetch failed'))
    const policy = new RobotsPolicy({ userAgent: AGENT, fetchImpl })

    expect(await policy.isAllowed('https://x.example.gov/private')).toBe(true)
  })

  it('fails open on a server error', async () => {
    const fetchImpl = vi.fn().mockResolvedValue(new Response('boom', { status: 503 }))
    const policy = new RobotsPolicy({ userAgent: AGENT, fetchImpl })

    expect(await policy.isAllowed('https://x.example.gov/anything')).toBe(true)
  })

  it('fetches once per origin, including concurrent lookups', async () => {
    const fetchImpl = vi.fn().mockImplementation(() => Promise.resolve(new Response('User-agent: *\nDisallow:', { status: 200 })))
    const policy = new RobotsPolicy({ userAgent: AGENT, fetchImpl })

    await Promise.all([
      policy.isAllowed('https://x.example.gov/a'),
      policy.isAllowed('https://x.example.gov/b'),
      policy.isAllowed('https://x.example.gov/c'),
    ])
    await policy.isAllowed('https://y.example.gov/a')

    expect(fetchImpl).toHaveBeenCalledTimes(2)
    expect(policy.cachedOrigins()).toEqual(['https://x.example.gov', 'https://y.example.gov'])
  })

  it('refetches after invalidation', async () => {
    const fetchImpl = vi.fn().mockImplementation(() => Promise.resolve(new Response('', { status: 404 })))
    const policy = new RobotsPolicy({ userAgent: AGENT, fetchImpl })

    await policy.isAllowed('https://x.example.gov/a')
    policy.invalidate('https://x.example.gov')
    await policy.isAllowed('https://x.example.gov/a')

    expect(fetchImpl).toHaveBeenCalledTimes(2)
  })

  it('lets a cancelled caller leave while the shared lookup continues', async () => {
    let answer: (response: Response) => void = () => {}
    const fetchImpl = vi.fn().mockImplementation(
      () =>
        new Promise<Response>((resolve) => {
          answer = resolve
        })
    )
    const policy = new RobotsPolicy({ userAgent: AGENT, fetchImpl })
    const controller = new AbortController()

    const cancelled = policy.isAllowed('https://x.example.gov/private', controller.signal)
    const waiting = policy.isAllowed('https://x.example.gov/private')
    controller.abort()

    await expect(cancelled).rejects.toBeInstanceOf(CancelledError)

    answer(new Response('User-agent: *\nDisallow: /private', { status: 200 }))
    expect(await waiting).toBe(false)
    expect(fetchImpl).toHaveBeenCalledTimes(1)
  })
})
