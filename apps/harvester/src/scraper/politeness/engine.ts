/**
 * Politeness Engine
 *
 * Owns the per-domain pacing state and the robots.txt policy for one
 * orchestrator. Every transport attempt goes through `allowed()` and then
 * `awaitTurn()`.
 *
 * Pacing is keyed by registrable domain. The check-sleep-stamp sequence in
 * `awaitTurn` runs under a per-domain mutex, so concurrent callers on the
 * same domain are spaced by at least the required interval.
 */

import type { ILogger } from '@bidwatch/logger'
import { loggers } from '../../config/logger.js'
import type { DomainPoliteness, OffPeakWindow, PolitenessStats } from '../types.js'
import { getRegistrableDomain } from '../utils/url.js'
import { sleep as defaultSleep, throwIfCancelled, type SleepFn } from '../utils/sleep.js'
import { KeyedMutex } from './keyed-mutex.js'
import { isWithinOffPeak, parseClock } from './off-peak.js'
import { RobotsPolicy, type FetchLike } from './robots.js'

export interface PolitenessOptions {
  /** Declared crawl agent; the only agent robots.txt is evaluated for */
  userAgent: string
  /** Minimum spacing between requests to one domain (default: 3) */
  requestDelaySeconds?: number
  /** Window during which the interval is halved (default: 23:00-06:00) */
  offPeakHours?: OffPeakWindow
  /** Per-domain minimum interval in seconds, keyed by registrable domain */
  domainOverrides?: Record<string, number>
  /** When false, robots.txt is never fetched and every URL is allowed */
  respectRobotsTxt?: boolean
  /** Treat a robots.txt Crawl-delay as a lower bound on spacing (default: true) */
  honorCrawlDelay?: boolean
  robotsFetchTimeoutMs?: number
  /** Injected for tests */
  clock?: () => number
  sleep?: SleepFn
  fetchImpl?: FetchLike
  robots?: RobotsPolicy
  logger?: ILogger
}

export const DEFAULT_OFF_PEAK: OffPeakWindow = { start: '23:00', end: '06:00' }

export class PolitenessEngine {
  readonly userAgent: string
  readonly respectRobotsTxt: boolean
  private readonly defaultDelaySeconds: number
  private readonly offPeakHours: OffPeakWindow
  private readonly honorCrawlDelay: boolean
  private readonly overrides = new Map<string, number>()
  private readonly domains = new Map<string, DomainPoliteness>()
  private readonly mutex = new KeyedMutex()
  private readonly robots: RobotsPolicy
  private readonly clock: () => number
  private readonly sleep: SleepFn
  private readonly log: ILogger

  constructor(options: PolitenessOptions) {
    this.userAgent = options.userAgent
    this.respectRobotsTxt = options.respectRobotsTxt ?? true
    this.defaultDelaySeconds = options.requestDelaySeconds ?? 3
    this.offPeakHours = options.offPeakHours ?? DEFAULT_OFF_PEAK
    this.honorCrawlDelay = options.honorCrawlDelay ?? true
    this.clock = options.clock ?? (() => Date.now())
    this.sleep = options.sleep ?? defaultSleep
    this.log = options.logger ?? loggers.politeness

    // Fail fast on a malformed window rather than on the first request
    parseClock(this.offPeakHours.start)
    parseClock(this.offPeakHours.end)

    for (const [domain, seconds] of Object.entries(options.domainOverrides ?? {})) {
      this.setDomainDelay(domain, seconds)
    }

    this.robots =
      options.robots ??
      new RobotsPolicy({
        userAgent: options.userAgent,
        fetchTimeoutMs: options.robotsFetchTimeoutMs,
        fetchImpl: options.fetchImpl,
        logger: this.log,
      })
  }

  /**
   * Whether robots.txt permits the declared agent to fetch `url`.
   * Never blocks on an unreachable robots.txt.
   *
   * @throws CancelledError when `signal` aborts while robots.txt is in flight
   */
  async allowed(url: string, signal?: AbortSignal): Promise<boolean> {
    if (!this.respectRobotsTxt) return true
    return this.robots.isAllowed(url, signal)
  }

  /**
   * Wait until the domain's interval has elapsed, then stamp the domain as
   * requested "now". Returns the delay applied, in seconds.
   *
   * @throws CancelledError when `signal` aborts while queued or sleeping
   */
  async awaitTurn(url: string, signal?: AbortSignal): Promise<number> {
    throwIfCancelled(signal)
    const domain = getRegistrableDomain(url)

    if (this.respectRobotsTxt && this.honorCrawlDelay) {
      // Warm the cache outside the lock so the crawl-delay bound is known
      await this.robots.getCrawlDelay(url, signal)
    }

    return this.mutex.runExclusive(
      domain,
      async () => {
        const state = this.getState(domain)
        const requiredMs = this.requiredIntervalMs(state, url)
        const now = this.clock()
        const elapsed = state.lastRequestAt === null ? Infinity : now - state.lastRequestAt
        const waitMs = elapsed < requiredMs ? requiredMs - elapsed : 0

        if (waitMs > 0) {
          this.log.debug('Pacing request', { domain, waitMs })
          await this.sleep(waitMs, signal)
        }

        throwIfCancelled(signal)
        state.lastRequestAt = this.clock()
        return waitMs / 1000
      },
      signal
    )
  }

  /**
   * Current interval for a domain in seconds, off-peak halving applied.
   */
  getRequiredInterval(url: string, at: Date = new Date(this.clock())): number {
    const domain = getRegistrableDomain(url)
    return this.requiredIntervalMs(this.getState(domain), url, at) / 1000
  }

  setDomainDelay(domain: string, seconds: number): void {
    if (!Number.isFinite(seconds) || seconds < 0) {
      throw new RangeError(`Domain delay must be a non-negative number, got ${seconds}`)
    }
    const key = domain.toLowerCase()
    this.overrides.set(key, seconds)
    const state = this.domains.get(key)
    if (state) state.minIntervalSeconds = seconds
  }

  clearRobotsCache(): void {
    this.robots.clearCache()
    this.log.info('Cleared robots.txt cache')
  }

  /**
   * Drop the cached robots.txt for an origin (`https://host`) or a bare host.
   */
  invalidate(originOrHost: string): void {
    const origin = /^https?:\/\//.test(originOrHost) ? originOrHost : `https://${originOrHost}`
    this.robots.invalidate(new URL(origin).origin)
  }

  getStats(): PolitenessStats {
    const domainDelays: Record<string, number> = {}
    const lastRequestTimes: Record<string, string> = {}

    for (const [domain, seconds] of this.overrides) {
      domainDelays[domain] = seconds
    }
    for (const [domain, state] of this.domains) {
      domainDelays[domain] = state.minIntervalSeconds
      if (state.lastRequestAt !== null) {
        lastRequestTimes[domain] = new Date(state.lastRequestAt).toISOString()
      }
    }

    return {
      cachedRobotsDomains: this.robots.cachedOrigins(),
      domainDelays,
      lastRequestTimes,
      offPeakHours: { ...this.offPeakHours },
      respectRobotsTxt: this.respectRobotsTxt,
    }
  }

  private getState(domain: string): DomainPoliteness {
    let state = this.domains.get(domain)
    if (!state) {
      state = {
        domain,
        lastRequestAt: null,
        minIntervalSeconds: this.overrides.get(domain) ?? this.defaultDelaySeconds,
        offPeakWindow: this.offPeakHours,
      }
      this.domains.set(domain, state)
    }
    return state
  }

  private requiredIntervalMs(state: DomainPoliteness, url: string, at: Date = new Date(this.clock())): number {
    let seconds = state.minIntervalSeconds
    if (isWithinOffPeak(state.offPeakWindow, at)) {
      seconds /= 2
    }

    if (this.respectRobotsTxt && this.honorCrawlDelay) {
      const crawlDelay = this.robots.peekCrawlDelay(url)
      if (crawlDelay !== null) {
        seconds = Math.max(seconds, crawlDelay)
      }
    }

    return seconds * 1000
  }
}
