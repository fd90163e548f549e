/**
 * robots.txt Policy
 *
 * Policy rules:
 * 1. Rules are looked up once per origin and cached for the process lifetime
 *    (invalidated manually through `invalidate()` / `clearCache()`).
 * 2. Groups naming our declared agent token take precedence over `User-agent: *`.
 * 3. Allow/Disallow use longest-match precedence; on a tie Allow wins.
 *    `*` and a trailing `$` are supported in patterns.
 * 4. Fail-open: an unreachable or erroring robots.txt is cached as "unknown"
 *    and every path is allowed. A 4xx means "no robots.txt", also allow-all.
 * 5. Crawl-delay from the matching group is exposed for pacing.
 */

import type { ILogger } from '@bidwatch/logger'
import { loggers } from '../../config/logger.js'
import { raceWithSignal } from '../utils/sleep.js'
import { getOrigin, getRobotsPath } from '../utils/url.js'

export interface RobotsRule {
  allow: boolean
  pattern: string
}

/**
 * Parsed rules that apply to our agent for one origin.
 */
export interface RobotsRules {
  rules: RobotsRule[]
  crawlDelaySeconds: number | null
  fetchedAt: number
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface RobotsPolicyOptions {
  /** Declared crawl agent, sent when fetching robots.txt and matched against groups */
  userAgent: string
  /** Request timeout in ms (default: 10000) */
  fetchTimeoutMs?: number
  fetchImpl?: FetchLike
  logger?: ILogger
}

interface RobotsGroup {
  agents: string[]
  rules: RobotsRule[]
  crawlDelaySeconds: number | null
}

/**
 * Product token of a User-Agent string, lowercased:
 * "OpportunityEngine/1.0 (+https://example.org/bot)" -> "opportunityengine".
 */
export function agentToken(userAgent: string): string {
  const first = userAgent.trim().split(/[\s/]/)[0] ?? ''
  return first.toLowerCase()
}

/**
 * Parse robots.txt text into the rules that apply to `userAgent`.
 */
export function parseRobotsTxt(text: string, userAgent: string): Omit<RobotsRules, 'fetchedAt'> {
  const groups: RobotsGroup[] = []
  let current: RobotsGroup | null = null
  let lastWasAgent = false

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim()
    if (!line) continue

    const colonIndex = line.indexOf(':')
    if (colonIndex === -1) continue

    const directive = line.slice(0, colonIndex).trim().toLowerCase()
    const value = line.slice(colonIndex + 1).trim()

    if (directive === 'user-agent') {
      // Consecutive User-agent lines share one group
      if (!current || !lastWasAgent) {
        current = { agents: [], rules: [], crawlDelaySeconds: null }
        groups.push(current)
      }
      current.agents.push(value.toLowerCase())
      lastWasAgent = true
      continue
    }

    lastWasAgent = false
    if (!current) continue

    if (directive === 'disallow') {
      // Empty Disallow = allow everything
      if (value) current.rules.push({ allow: false, pattern: value })
    } else if (directive === 'allow') {
      if (value) current.rules.push({ allow: true, pattern: value })
    } else if (directive === 'crawl-delay') {
      const delay = Number.parseFloat(value)
      if (Number.isFinite(delay) && delay > 0) {
        current.crawlDelaySeconds = delay
      }
    }
  }

  const token = agentToken(userAgent)
  const specific = groups.filter((group) =>
    group.agents.some((agent) => agent !== '*' && token.length > 0 && agentToken(agent) === token)
  )
  const applicable = specific.length > 0 ? specific : groups.filter((group) => group.agents.includes('*'))

  const crawlDelays = applicable
    .map((group) => group.crawlDelaySeconds)
    .filter((delay): delay is number => delay !== null)

  return {
    rules: applicable.flatMap((group) => group.rules),
    crawlDelaySeconds: crawlDelays.length > 0 ? Math.max(...crawlDelays) : null,
  }
}

function patternToRegExp(pattern: string): RegExp {
  const anchored = pattern.endsWith('$')
  const body = anchored ? pattern.slice(0, -1) : pattern
  const escaped = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*')
  return new RegExp(`^${escaped}${anchored ? '$' : ''}`)
}

/**
 * Evaluate a path against parsed rules. Longest matching pattern wins;
 * Allow wins a tie. No matching rule means allowed.
 */
export function isPathAllowed(path: string, rules: RobotsRule[]): boolean {
  let best: RobotsRule | null = null

  for (const rule of rules) {
    if (!patternToRegExp(rule.pattern).test(path)) continue
    if (
      !best ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow && !best.allow)
    ) {
      best = rule
    }
  }

  return best ? best.allow : true
}

/**
 * robots.txt policy with a process-lifetime cache per origin.
 * Concurrent lookups for the same origin share one fetch.
 */
export class RobotsPolicy {
  private readonly userAgent: string
  private readonly fetchTimeoutMs: number
  private readonly fetchImpl: FetchLike
  private readonly log: ILogger
  /** null = robots.txt unknown (fetch failed), assume allowed */
  private readonly cache = new Map<string, RobotsRules | null>()
  private readonly inFlight = new Map<string, Promise<RobotsRules | null>>()

  constructor(options: RobotsPolicyOptions) {
    this.userAgent = options.userAgent
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 10000
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
    this.log = options.logger ?? loggers.politeness
  }

  /**
   * Check if the URL may be fetched by our declared agent.
   * A cancelled caller leaves at once; the shared lookup keeps going.
   */
  async isAllowed(url: string, signal?: AbortSignal): Promise<boolean> {
    const rules = await this.getRules(url, signal)
    if (!rules) return true
    return isPathAllowed(getRobotsPath(url), rules.rules)
  }

  /**
   * Crawl-delay (seconds) declared for our agent on the URL's origin, if any.
   */
  async getCrawlDelay(url: string, signal?: AbortSignal): Promise<number | null> {
    const rules = await this.getRules(url, signal)
    return rules?.crawlDelaySeconds ?? null
  }

  /**
   * Crawl-delay from the cache only; never triggers a fetch.
   */
  peekCrawlDelay(url: string): number | null {
    return this.cache.get(getOrigin(url))?.crawlDelaySeconds ?? null
  }

  cachedOrigins(): string[] {
    return Array.from(this.cache.keys())
  }

  invalidate(origin: string): void {
    this.cache.delete(origin)
  }

  clearCache(): void {
    this.cache.clear()
  }

  private async getRules(url: string, signal?: AbortSignal): Promise<RobotsRules | null> {
    const origin = getOrigin(url)

    if (this.cache.has(origin)) {
      return this.cache.get(origin) ?? null
    }

    const pending = this.inFlight.get(origin)
    if (pending) return raceWithSignal(pending, signal)

    const lookup = this.fetchRules(origin)
      .then((rules) => {
        this.cache.set(origin, rules)
        return rules
      })
      .finally(() => {
        this.inFlight.delete(origin)
      })

    this.inFlight.set(origin, lookup)
    return raceWithSignal(lookup, signal)
  }

  private async fetchRules(origin: string): Promise<RobotsRules | null> {
    const robotsUrl = `${origin}/robots.txt`
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.fetchTimeoutMs)

    try {
      const response = await this.fetchImpl(robotsUrl, {
        method: 'GET',
        headers: { 'User-Agent': this.userAgent, Accept: 'text/plain' },
        signal: controller.signal,
        redirect: 'follow',
      })

      // 4xx = no robots.txt = allow all
      if (response.status >= 400 && response.status < 500) {
        this.log.debug('No robots.txt, allowing all paths', { origin, status: response.status })
        return { rules: [], crawlDelaySeconds: null, fetchedAt: Date.now() }
      }

      if (!response.ok) {
        this.log.warn('robots.txt unavailable, failing open', { origin, status: response.status })
        return null
      }

      const text = await response.text()
      const parsed = parseRobotsTxt(text, this.userAgent)
      this.log.debug('Cached robots.txt', {
        origin,
        ruleCount: parsed.rules.length,
        crawlDelaySeconds: parsed.crawlDelaySeconds,
      })
      return { ...parsed, fetchedAt: Date.now() }
    } catch (error) {
      this.log.warn('robots.txt fetch failed, failing open', { origin }, error)
      return null
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
