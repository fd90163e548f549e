/**
 * Acquisition Orchestrator
 *
 * Owns the portal registry and the shared politeness/transport/browser
 * resources. Runs portals one at a time or all concurrently, reports
 * progress to subscribers, hands records to the store and the optional
 * analysis service, and supports operator cancellation.
 *
 * Run state machine: starting -> running -> completed | failed | cancelled.
 * A strategy or fetch failure never reaches this layer; only errors thrown
 * by a portal run itself (or orchestration bugs) mark a result failed.
 */

import type { ILogger } from '@bidwatch/logger'
import type { HarvesterConfig } from '../config/schema.js'
import { loggers } from '../config/logger.js'
import { CompositeAuditSink, InMemoryAuditSink, LoggingAuditSink } from './audit.js'
import { StrategyChain } from './chain.js'
import { CancelledError, OrchestrationError, isCancellation, toUserMessage } from './errors.js'
import { BrowserPool, type BrowserLauncher } from './fetch/browser-pool.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { Transport } from './fetch/transport.js'
import { DEFAULT_BROWSER_AGENTS, UserAgentRotator } from './fetch/user-agents.js'
import {
  recordAnalysisSummary,
  recordPortalRunCancelled,
  recordPortalRunFailed,
  recordStoreFailed,
} from './metrics.js'
import { PolitenessEngine } from './politeness/engine.js'
import type { FetchLike } from './politeness/robots.js'
import { PortalScraper, type StrategyTiming } from './portal-scraper.js'
import { PortalRegistry } from './registry.js'
import { createStrategies, toPortalTarget } from './strategies/index.js'
import type {
  AnalysisService,
  AuditSink,
  OpportunityStore,
  PolitenessStats,
  PortalRunStats,
  ProgressSubscriber,
  RawRecord,
  ScrapingProgress,
  ScrapingResult,
} from './types.js'
import { throwIfCancelled } from './utils/sleep.js'

export interface OrchestratorOptions {
  registry: PortalRegistry
  store?: OpportunityStore
  analysis?: AnalysisService
  politeness?: PolitenessEngine
  browser?: BrowserPool | null
  /** Recent fetch attempts, exposed by the status server */
  auditLog?: InMemoryAuditSink
  logger?: ILogger
}

export interface FromConfigOptions {
  store?: OpportunityStore
  analysis?: AnalysisService
  /** Extra audit sinks, in addition to the log and the in-memory buffer */
  auditSinks?: AuditSink[]
  fetchImpl?: FetchLike
  launcher?: BrowserLauncher
}

export type RunSummary = Omit<ScrapingResult, 'records'> & { finishedAt: string }

export interface OrchestratorStatus {
  availablePortals: string[]
  activeRuns: string[]
  lastResults: Record<string, RunSummary>
  politeness: PolitenessStats | null
  browser: { poolSize: number; inUse: number; waiting: number; launched: boolean } | null
}

export interface PortalInfo {
  name: string
  displayName: string
  baseUrl: string
  priority: number
  running: boolean
  strategies: string[]
  stats: PortalRunStats | null
  performance: Record<string, StrategyTiming>
  lastResult: RunSummary | null
}

interface ActiveRun {
  controller: AbortController
  done: Promise<ScrapingResult>
}

export class AcquisitionOrchestrator {
  readonly registry: PortalRegistry
  readonly auditLog: InMemoryAuditSink | null
  private readonly store?: OpportunityStore
  private readonly analysis?: AnalysisService
  private readonly politeness: PolitenessEngine | null
  private readonly browser: BrowserPool | null
  private readonly log: ILogger
  private readonly subscribers = new Set<ProgressSubscriber>()
  private readonly active = new Map<string, ActiveRun>()
  private readonly lastResults = new Map<string, RunSummary>()

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry
    this.store = options.store
    this.analysis = options.analysis
    this.politeness = options.politeness ?? null
    this.browser = options.browser ?? null
    this.auditLog = options.auditLog ?? null
    this.log = options.logger ?? loggers.orchestrator
  }

  /**
   * Wire the whole acquisition stack from validated configuration. Only
   * enabled portals are registered.
   */
  static fromConfig(config: HarvesterConfig, options: FromConfigOptions = {}): AcquisitionOrchestrator {
    const { scraping, browser: browserSettings } = config

    const politeness = new PolitenessEngine({
      userAgent: scraping.userAgent,
      requestDelaySeconds: scraping.requestDelaySeconds,
      offPeakHours: scraping.offPeakHours,
      domainOverrides: scraping.domainOverrides,
      respectRobotsTxt: scraping.respectRobotsTxt,
      honorCrawlDelay: scraping.honorCrawlDelay,
      robotsFetchTimeoutMs: scraping.timeoutMs,
      fetchImpl: options.fetchImpl,
    })

    const auditLog = new InMemoryAuditSink()
    const audit = new CompositeAuditSink([new LoggingAuditSink(), auditLog, ...(options.auditSinks ?? [])])

    const browser = browserSettings.enabled
      ? new BrowserPool({
          poolSize: browserSettings.poolSize,
          headless: browserSettings.headless,
          launcher: options.launcher,
        })
      : null

    const transport = new Transport({
      politeness,
      userAgents: new UserAgentRotator(scraping.userAgent, scraping.userAgentPool ?? DEFAULT_BROWSER_AGENTS),
      audit,
      http: new HttpFetcher({ maxResponseBytes: scraping.maxResponseBytes, fetchImpl: options.fetchImpl }),
      browser,
      retry: {
        maxRetries: scraping.maxRetries,
        retryBaseDelayMs: scraping.retryBaseDelayMs,
        maxBackoffMs: scraping.maxBackoffMs,
      },
      timeoutMs: scraping.timeoutMs,
      navigationTimeoutMs: browserSettings.navigationTimeoutMs,
      maxInteractionMs: browserSettings.maxInteractionMs,
    })

    const registry = new PortalRegistry()
    for (const portal of config.portals) {
      if (!portal.enabled) {
        loggers.config.info('Portal disabled, not registering', { portal: portal.name })
        continue
      }

      const strategies = createStrategies(portal, { transport, waitAfterLoadMs: browserSettings.waitAfterLoadMs })
      const scraper = new PortalScraper(toPortalTarget(portal), new StrategyChain(strategies), {
        displayName: portal.displayName,
      })
      registry.register(scraper, { displayName: portal.displayName, priority: portal.priority })
    }

    loggers.orchestrator.info('Orchestrator configured', {
      portals: registry.list(),
      browserEnabled: browser !== null,
      respectRobotsTxt: scraping.respectRobotsTxt,
    })

    return new AcquisitionOrchestrator({
      registry,
      store: options.store,
      analysis: options.analysis,
      politeness,
      browser,
      auditLog,
    })
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Runs
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Run one portal to completion. Never throws; failures come back as
   * `success: false` results.
   */
  async runPortal(name: string, limit: number): Promise<ScrapingResult> {
    const runner = this.registry.get(name)
    if (!runner) {
      this.log.warn('Unknown portal requested', { portal: name })
      return failedResult(name, `Unknown portal '${name}'`, 0)
    }

    const inFlight = this.active.get(name)
    if (inFlight) {
      this.log.warn('Portal run already in progress', { portal: name })
      return failedResult(name, `Portal '${name}' is already running`, 0)
    }

    const controller = new AbortController()
    // Registered before the first progress event fires, so subscribers can cancel it
    const done = Promise.resolve().then(() => this.execute(name, limit, controller.signal))
    this.active.set(name, { controller, done })

    try {
      return await done
    } finally {
      this.active.delete(name)
    }
  }

  /**
   * Run every registered portal concurrently. One portal's failure does not
   * cancel or affect its siblings.
   */
  async runAll(limitPerPortal: number): Promise<ScrapingResult[]> {
    const names = this.registry.list()
    this.log.info('Starting run for all portals', { portals: names, limitPerPortal })

    const settled = await Promise.allSettled(names.map((name) => this.runPortal(name, limitPerPortal)))

    const results = settled.map((outcome, index): ScrapingResult => {
      if (outcome.status === 'fulfilled') return outcome.value
      const portal = names[index] ?? 'unknown'
      return failedResult(portal, toUserMessage(outcome.reason), 0)
    })

    this.log.info('All portal runs finished', {
      total: results.length,
      succeeded: results.filter((result) => result.success).length,
      records: results.reduce((sum, result) => sum + result.recordCount, 0),
    })
    return results
  }

  /**
   * Cancel one in-flight run, or every run when no name is given.
   * Returns the number of runs signalled.
   */
  cancel(name?: string): number {
    const targets = name !== undefined ? [name] : Array.from(this.active.keys())
    let cancelled = 0

    for (const portal of targets) {
      const run = this.active.get(portal)
      if (!run || run.controller.signal.aborted) continue
      run.controller.abort(new CancelledError())
      cancelled++
      this.log.info('Cancellation requested', { portal })
    }

    return cancelled
  }

  private async execute(name: string, limit: number, signal: AbortSignal): Promise<ScrapingResult> {
    const startedAt = Date.now()
    let records: RawRecord[] = []

    this.emit({ portal: name, status: 'starting', percentComplete: 0, recordsFound: 0, message: 'Starting portal run' })

    try {
      const runner = this.registry.get(name)
      if (!runner) {
        throw new OrchestrationError(`Portal '${name}' disappeared from the registry`)
      }

      this.emit({ portal: name, status: 'running', percentComplete: 25, recordsFound: 0, message: 'Acquiring records' })
      records = await runner.run(limit, signal)
      throwIfCancelled(signal)

      this.emit({
        portal: name,
        status: 'running',
        percentComplete: 75,
        recordsFound: records.length,
        message: `Acquired ${records.length} records`,
      })

      const opportunityIds = await this.persist(name, records)
      if (opportunityIds) {
        await this.analyze(name, opportunityIds)
      }

      const result: ScrapingResult = {
        portal: name,
        success: true,
        recordCount: records.length,
        durationMs: Date.now() - startedAt,
        records,
        storedCount: opportunityIds?.length,
      }

      this.emit({
        portal: name,
        status: 'completed',
        percentComplete: 100,
        recordsFound: records.length,
        message: records.length > 0 ? `Completed with ${records.length} records` : 'Completed, no records found',
      })
      return this.remember(result)
    } catch (error) {
      const durationMs = Date.now() - startedAt

      if (isCancellation(error) || signal.aborted) {
        recordPortalRunCancelled({ portal: name, durationMs })
        this.emit({
          portal: name,
          status: 'cancelled',
          percentComplete: 100,
          recordsFound: records.length,
          message: 'Run cancelled',
        })
        return this.remember({ ...failedResult(name, 'Run cancelled', durationMs), cancelled: true })
      }

      const message = toUserMessage(error)
      recordPortalRunFailed({ portal: name, error: message, durationMs })
      this.log.error('Portal run failed', { portal: name }, error)
      this.emit({ portal: name, status: 'failed', percentComplete: 100, recordsFound: 0, message })
      return this.remember(failedResult(name, message, durationMs))
    }
  }

  /**
   * Hand records to the store. Returns the stored ids, or null when there is
   * no store, nothing to store, or the store failed.
   */
  private async persist(name: string, records: RawRecord[]): Promise<string[] | null> {
    if (!this.store || records.length === 0) return null

    try {
      const outcome = await this.store.store(name, records)
      this.log.info('Stored records', { portal: name, storedCount: outcome.storedCount })
      return outcome.opportunityIds
    } catch (error) {
      recordStoreFailed({ portal: name, recordCount: records.length, error: toUserMessage(error) })
      return null
    }
  }

  private async analyze(name: string, opportunityIds: string[]): Promise<void> {
    const { analysis } = this
    if (!analysis || opportunityIds.length === 0) return

    const outcomes = await Promise.allSettled(opportunityIds.map((id) => analysis.analyze(id)))
    const failures = outcomes.filter((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected')

    for (const failure of failures.slice(0, 3)) {
      this.log.warn('Analysis failed', { portal: name }, failure.reason)
    }
    recordAnalysisSummary({ portal: name, analyzed: outcomes.length - failures.length, failed: failures.length })
  }

  private remember(result: ScrapingResult): ScrapingResult {
    const { records: _records, ...summary } = result
    this.lastResults.set(result.portal, { ...summary, finishedAt: new Date().toISOString() })
    return result
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Progress
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Subscribe to progress events. Returns an unsubscribe function.
   */
  onProgress(subscriber: ProgressSubscriber): () => void {
    this.subscribers.add(subscriber)
    return () => this.offProgress(subscriber)
  }

  offProgress(subscriber: ProgressSubscriber): void {
    this.subscribers.delete(subscriber)
  }

  private emit(progress: ScrapingProgress): void {
    this.log.debug('Progress', { ...progress })
    for (const subscriber of this.subscribers) {
      try {
        subscriber(progress)
      } catch (error) {
        this.log.warn('Progress subscriber threw', { portal: progress.portal, status: progress.status }, error)
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Introspection
  // ═══════════════════════════════════════════════════════════════════════════

  isRunning(name: string): boolean {
    return this.active.has(name)
  }

  getStatus(): OrchestratorStatus {
    return {
      availablePortals: this.registry.list(),
      activeRuns: Array.from(this.active.keys()),
      lastResults: Object.fromEntries(this.lastResults),
      politeness: this.politeness?.getStats() ?? null,
      browser: this.browser?.stats() ?? null,
    }
  }

  listPortals(): PortalInfo[] {
    return this.registry
      .list()
      .map((name) => this.getPortalInfo(name))
      .filter((info): info is PortalInfo => info !== undefined)
  }

  getPortalInfo(name: string): PortalInfo | undefined {
    const entry = this.registry.entry(name)
    if (!entry) return undefined

    const { runner } = entry
    const scraper = runner instanceof PortalScraper ? runner : null

    return {
      name: runner.name,
      displayName: entry.displayName,
      baseUrl: runner.baseUrl,
      priority: entry.priority,
      running: this.active.has(name),
      strategies: scraper?.strategyNames ?? [],
      stats: scraper?.getStats() ?? null,
      performance: scraper?.getPerformanceSummary() ?? {},
      lastResult: this.lastResults.get(name) ?? null,
    }
  }

  /**
   * Cancel everything in flight, wait for the runs to settle, release the
   * browser.
   */
  async close(): Promise<void> {
    const pending = Array.from(this.active.values()).map((run) => run.done)
    this.cancel()
    await Promise.allSettled(pending)
    if (this.browser) {
      await this.browser.close()
    }
    this.log.info('Orchestrator closed')
  }
}

function failedResult(portal: string, errorMessage: string, durationMs: number): ScrapingResult {
  return { portal, success: false, recordCount: 0, errorMessage, durationMs, records: [] }
}
