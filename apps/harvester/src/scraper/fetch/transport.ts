/**
 * Transport Layer
 *
 * Executes requests for strategies over two backends:
 * - `http`: native fetch through HttpFetcher
 * - `browser`: a page from the BrowserPool, rendered and serialised
 *
 * Before every attempt: robots.txt check, then politeness pacing.
 * After every attempt: one FetchAttempt to the audit sink.
 * Transient failures (timeout, connection errors, 5xx, 429) are retried
 * `maxRetries` times with exponential backoff; everything else fails fast.
 */

import type { ILogger } from '@bidwatch/logger'
import { loggers } from '../../config/logger.js'
import { safeRecord } from '../audit.js'
import {
  AcquisitionError,
  AutomationError,
  CancelledError,
  RobotsDisallowedError,
  TransientNetworkError,
  classifyError,
  errorForStatus,
} from '../errors.js'
import type { PolitenessEngine } from '../politeness/engine.js'
import type {
  AuditSink,
  FetchAttempt,
  FetchOptions,
  TransportBackend,
  TransportResponse,
} from '../types.js'
import { linkedTimeout, raceWithSignal, sleep as defaultSleep, throwIfCancelled, type SleepFn } from '../utils/sleep.js'
import type { BrowserPage, BrowserPool } from './browser-pool.js'
import { HttpFetcher } from './http-fetcher.js'
import { UserAgentRotator } from './user-agents.js'

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number
  retryBaseDelayMs: number
  maxBackoffMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  retryBaseDelayMs: 1000,
  maxBackoffMs: 30000,
}

const SELECTOR_WAIT_MS = 10000

export interface TransportOptions {
  politeness: PolitenessEngine
  userAgents?: UserAgentRotator
  audit?: AuditSink
  http?: HttpFetcher
  /** Required for the browser backend */
  browser?: BrowserPool | null
  retry?: Partial<RetryPolicy>
  /** Per-attempt timeout in ms (default: 30000) */
  timeoutMs?: number
  /** Page-load timeout for the browser backend (default: timeoutMs) */
  navigationTimeoutMs?: number
  /** Upper bound on one browser automation session (default: 120000) */
  maxInteractionMs?: number
  sleep?: SleepFn
  clock?: () => number
  logger?: ILogger
}

/**
 * Handed to browser automation callbacks. Every navigation the callback
 * triggers (pagination clicks and the like) goes through `navigate()`, which
 * checks robots.txt, paces and audits it as its own physical request.
 */
export interface AutomationSession {
  page: BrowserPage
  navigate(action: () => Promise<void>): Promise<void>
  signal: AbortSignal
}

interface AttemptContext {
  url: string
  options: FetchOptions
  backend: TransportBackend
  attempt: number
  userAgent: string
  appliedDelaySeconds: number
}

export class Transport {
  readonly retryPolicy: RetryPolicy
  private readonly politeness: PolitenessEngine
  private readonly userAgents: UserAgentRotator
  private readonly audit?: AuditSink
  private readonly http: HttpFetcher
  private readonly browser: BrowserPool | null
  private readonly timeoutMs: number
  private readonly navigationTimeoutMs: number
  private readonly maxInteractionMs: number
  private readonly sleep: SleepFn
  private readonly clock: () => number
  private readonly log: ILogger

  constructor(options: TransportOptions) {
    this.politeness = options.politeness
    this.userAgents = options.userAgents ?? new UserAgentRotator(options.politeness.userAgent)
    this.audit = options.audit
    this.http = options.http ?? new HttpFetcher()
    this.browser = options.browser ?? null
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry }
    this.timeoutMs = options.timeoutMs ?? 30000
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? this.timeoutMs
    this.maxInteractionMs = options.maxInteractionMs ?? 120000
    this.sleep = options.sleep ?? defaultSleep
    this.clock = options.clock ?? (() => Date.now())
    this.log = options.logger ?? loggers.transport
  }

  get browserAvailable(): boolean {
    return this.browser !== null
  }

  /**
   * Fetch a URL through the chosen backend.
   *
   * @throws RobotsDisallowedError when robots.txt forbids the URL
   * @throws TransientNetworkError once retries are spent
   * @throws PermanentRequestError / AutomationError without retrying
   * @throws CancelledError when `options.signal` aborts
   */
  async fetch(url: string, backend: TransportBackend, options: FetchOptions): Promise<TransportResponse> {
    const { maxRetries } = this.retryPolicy

    for (let attempt = 0; ; attempt++) {
      const context = await this.prepareAttempt(url, backend, options, attempt)
      const startedAt = this.clock()

      try {
        const result = await this.executeOnce(context)
        const latencyMs = this.clock() - startedAt
        this.recordAttempt(context, startedAt, { httpStatus: result.status, latencyMs, error: null })

        return {
          url: result.url,
          status: result.status,
          body: result.body,
          contentType: result.contentType,
          backend,
          latencyMs,
          attempts: attempt + 1,
        }
      } catch (rawError) {
        const error = this.toAcquisitionError(rawError, url, options.signal)
        this.recordAttempt(context, startedAt, {
          httpStatus: error.statusCode ?? null,
          latencyMs: this.clock() - startedAt,
          error,
        })

        if (!error.retryable || attempt >= maxRetries) {
          if (error.retryable) {
            this.log.warn('Retries exhausted', { url, attempts: attempt + 1, strategy: options.strategyName })
          }
          throw error
        }

        const backoffMs = this.backoffDelay(attempt)
        this.log.info('Retrying after transient failure', {
          url,
          attempt: attempt + 1,
          backoffMs,
          reason: error.message,
        })
        await this.sleep(backoffMs, options.signal)
      }
    }
  }

  /**
   * Run a full browser automation session against `url`: one paced,
   * audited navigation, then `interact` drives the page. Not retried.
   * The whole session is bounded by `maxInteractionMs`.
   */
  async automate<T>(
    url: string,
    options: FetchOptions,
    interact: (session: AutomationSession) => Promise<T>
  ): Promise<T> {
    const browser = this.requireBrowser()
    const context = await this.prepareAttempt(url, 'browser', options, 0)
    const startedAt = this.clock()
    const budget = linkedTimeout(this.maxInteractionMs, options.signal)
    const sessionOptions: FetchOptions = { ...options, signal: budget.signal }
    let navigationStatus: number | null = null
    let navigationRecorded = false

    const toSessionError = (rawError: unknown, target: string): AcquisitionError =>
      budget.timedOut() && !options.signal?.aborted
        ? new AutomationError(`Browser session exceeded ${this.maxInteractionMs}ms`, { url: target })
        : this.toAcquisitionError(rawError, target, options.signal)

    try {
      return await raceWithSignal(
        browser.withPage(
          async (page) => {
            const navigation = await page.goto(url, { timeoutMs: options.timeoutMs ?? this.navigationTimeoutMs })
            navigationStatus = navigation?.status ?? null
            const statusError = navigation ? errorForStatus(navigation.status, url) : null
            if (statusError) throw statusError

            this.recordAttempt(context, startedAt, {
              httpStatus: navigationStatus,
              latencyMs: this.clock() - startedAt,
              error: null,
            })
            navigationRecorded = true

            const navigate = async (action: () => Promise<void>): Promise<void> => {
              const turn = await this.prepareAttempt(page.url(), 'browser', sessionOptions, 0)
              const turnStartedAt = this.clock()

              try {
                await action()
              } catch (rawError) {
                const error =
                  rawError instanceof Error && !(rawError instanceof AcquisitionError) && !budget.signal.aborted
                    ? new AutomationError(`Browser failure: ${rawError.message}`, { url: turn.url, cause: rawError })
                    : toSessionError(rawError, turn.url)
                this.recordAttempt({ ...turn, url: page.url() }, turnStartedAt, {
                  httpStatus: null,
                  latencyMs: this.clock() - turnStartedAt,
                  error,
                })
                throw error
              }

              this.recordAttempt({ ...turn, url: page.url() }, turnStartedAt, {
                httpStatus: null,
                latencyMs: this.clock() - turnStartedAt,
                error: null,
              })
            }

            return interact({ page, signal: budget.signal, navigate })
          },
          { userAgent: context.userAgent, signal: budget.signal }
        ),
        budget.signal
      )
    } catch (rawError) {
      const error = toSessionError(rawError, url)
      // Page turns audit themselves; only the opening navigation is recorded here
      if (!navigationRecorded) {
        this.recordAttempt(context, startedAt, {
          httpStatus: navigationStatus,
          latencyMs: this.clock() - startedAt,
          error,
        })
      }
      throw error
    } finally {
      budget.dispose()
    }
  }

  /**
   * Backoff before retry n (0-based): base * 2^n, capped.
   */
  backoffDelay(retry: number): number {
    const { retryBaseDelayMs, maxBackoffMs } = this.retryPolicy
    return Math.min(retryBaseDelayMs * Math.pow(2, retry), maxBackoffMs)
  }

  private async prepareAttempt(
    url: string,
    backend: TransportBackend,
    options: FetchOptions,
    attempt: number
  ): Promise<AttemptContext> {
    throwIfCancelled(options.signal)

    const userAgent = this.userAgents.next()

    if (!(await this.politeness.allowed(url, options.signal))) {
      const error = new RobotsDisallowedError(url)
      this.recordAttempt(
        { url, options, backend, attempt, userAgent, appliedDelaySeconds: 0 },
        this.clock(),
        { httpStatus: null, latencyMs: 0, error }
      )
      this.log.info('Skipping URL disallowed by robots.txt', { url, strategy: options.strategyName })
      throw error
    }

    const appliedDelaySeconds = await this.politeness.awaitTurn(url, options.signal)
    return { url, options, backend, attempt, userAgent, appliedDelaySeconds }
  }

  private async executeOnce(context: AttemptContext): Promise<{
    url: string
    status: number
    body: string
    contentType: string | null
  }> {
    const { url, options, userAgent } = context
    const timeoutMs = options.timeoutMs ?? (context.backend === 'browser' ? this.navigationTimeoutMs : this.timeoutMs)
    const timeout = linkedTimeout(timeoutMs, options.signal)

    try {
      if (context.backend === 'http') {
        return await this.http.fetchOnce(url, {
          method: options.method ?? 'GET',
          headers: { 'User-Agent': userAgent, ...options.headers },
          body: options.body,
          signal: timeout.signal,
        })
      }

      return await raceWithSignal(this.render(url, options, userAgent, timeoutMs, timeout.signal), timeout.signal)
    } catch (error) {
      if (timeout.timedOut() && !options.signal?.aborted) {
        if (context.backend === 'browser') {
          throw new AutomationError(`Page load timed out after ${timeoutMs}ms`, { url, cause: error })
        }
        throw new TransientNetworkError(`Request timed out after ${timeoutMs}ms`, { url, cause: error })
      }
      throw error
    } finally {
      timeout.dispose()
    }
  }

  private render(
    url: string,
    options: FetchOptions,
    userAgent: string,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<{ url: string; status: number; body: string; contentType: string | null }> {
    const browser = this.requireBrowser()

    return browser.withPage(
      async (page) => {
        const navigation = await page.goto(url, { timeoutMs })
        const status = navigation?.status ?? 200
        const statusError = errorForStatus(status, url)
        if (statusError) throw statusError

        const selector = options.waitForSelector
        if (selector) {
          // Missing selector is not fatal: extract whatever rendered
          await page
            .waitForSelector(selector, { timeoutMs: Math.min(SELECTOR_WAIT_MS, timeoutMs) })
            .catch((error: unknown) => {
              this.log.warn('Selector did not appear, using current content', { url, selector }, error)
            })
        }
        if (options.waitAfterLoadMs) {
          await page.waitForTimeout(options.waitAfterLoadMs)
        }

        return {
          url: navigation?.url ?? page.url(),
          status,
          body: await page.content(),
          contentType: 'text/html',
        }
      },
      { userAgent, signal }
    )
  }

  private requireBrowser(): BrowserPool {
    if (!this.browser) {
      throw new AutomationError('Browser backend is not enabled')
    }
    return this.browser
  }

  private toAcquisitionError(error: unknown, url: string, signal?: AbortSignal): AcquisitionError {
    if (signal?.aborted) {
      return error instanceof CancelledError ? error : new CancelledError()
    }
    return classifyError(error, url)
  }

  private recordAttempt(
    context: AttemptContext,
    startedAt: number,
    outcome: { httpStatus: number | null; latencyMs: number; error: AcquisitionError | null }
  ): void {
    const attempt: FetchAttempt = Object.freeze({
      url: context.url,
      portal: context.options.portal ?? null,
      strategyName: context.options.strategyName,
      backend: context.backend,
      startedAt: new Date(startedAt),
      httpStatus: outcome.httpStatus,
      latencyMs: outcome.latencyMs,
      succeeded: outcome.error === null,
      errorKind: outcome.error?.kind ?? null,
      errorMessage: outcome.error?.message ?? null,
      userAgent: context.userAgent,
      robotsTxtRespected: this.politeness.respectRobotsTxt,
      appliedDelaySeconds: context.appliedDelaySeconds,
      attempt: context.attempt,
    })

    safeRecord(this.audit, attempt, this.log)
  }
}
