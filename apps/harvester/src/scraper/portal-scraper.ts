/**
 * Portal Scraper
 *
 * One per portal. Drives the portal's strategy chain, attaches portal
 * identity, cleans the records and keeps run statistics. Never persists.
 */

import type { ILogger } from '@bidwatch/logger'
import { loggers } from '../config/logger.js'
import type { StrategyChain } from './chain.js'
import { recordPortalRunCompleted } from './metrics.js'
import type {
  PortalRunStats,
  PortalRunner,
  PortalTarget,
  RawRecord,
  StrategyOutcome,
} from './types.js'
import { resolveUrl } from './utils/url.js'

export interface StrategyTiming {
  avgMs: number
  minMs: number
  maxMs: number
  count: number
}

export interface PortalScraperOptions {
  displayName?: string
  logger?: ILogger
}

const REQUIRED_WEIGHT = 0.7
const OPTIONAL_WEIGHT = 0.3

/**
 * Share of populated fields: required (title, externalId, portal) weigh 0.7,
 * optional (issuingEntity, dueAt, description, url) 0.3.
 */
export function computeCompleteness(record: RawRecord): number {
  const required = [record.title, record.externalId, record.portal]
  const optional = [record.issuingEntity, record.dueAt, record.description, record.url]

  const filled = (values: unknown[]): number =>
    values.filter((value) => value !== undefined && value !== null && value !== '').length / values.length

  return filled(required) * REQUIRED_WEIGHT + filled(optional) * OPTIONAL_WEIGHT
}

export class PortalScraper implements PortalRunner {
  readonly displayName: string
  private readonly log: ILogger
  private stats: PortalRunStats = {
    recordsFound: 0,
    lastRunDurationMs: null,
    lastStrategy: null,
    averageCompleteness: null,
    runs: 0,
  }
  private lastOutcomes: StrategyOutcome[] = []
  private readonly timings = new Map<string, number[]>()

  constructor(
    private readonly target: PortalTarget,
    private readonly chain: StrategyChain,
    options: PortalScraperOptions = {}
  ) {
    this.displayName = options.displayName ?? target.name
    this.log = options.logger ?? loggers.portal.child(target.name)
  }

  get name(): string {
    return this.target.name
  }

  get baseUrl(): string {
    return this.target.baseUrl
  }

  get searchUrl(): string {
    return this.target.searchUrl
  }

  get strategyNames(): string[] {
    return this.chain.strategies.map((strategy) => strategy.name)
  }

  /**
   * Acquire up to `limit` records for this portal.
   *
   * @throws CancelledError when the signal aborts mid-run
   */
  async run(limit: number, signal?: AbortSignal): Promise<RawRecord[]> {
    const startedAt = Date.now()
    const result = await this.chain.acquire(this.target, limit, signal)

    const { records, dropped, duplicates } = this.clean(result.records, limit)
    const durationMs = Date.now() - startedAt

    const averageCompleteness =
      records.length > 0
        ? records.reduce((sum, record) => sum + computeCompleteness(record), 0) / records.length
        : null

    for (const outcome of result.outcomes) {
      if (outcome.status === 'unavailable') continue
      const timings = this.timings.get(outcome.strategy) ?? []
      timings.push(outcome.durationMs)
      this.timings.set(outcome.strategy, timings)
    }

    this.lastOutcomes = result.outcomes
    this.stats = {
      recordsFound: records.length,
      lastRunDurationMs: durationMs,
      lastStrategy: result.strategyUsed,
      averageCompleteness,
      runs: this.stats.runs + 1,
    }

    recordPortalRunCompleted({
      portal: this.name,
      strategyUsed: result.strategyUsed,
      recordCount: records.length,
      droppedRecords: dropped,
      duplicateRecords: duplicates,
      averageCompleteness,
      durationMs,
      outcomes: result.outcomes,
    })

    return records
  }

  getStats(): PortalRunStats {
    return { ...this.stats }
  }

  getLastOutcomes(): StrategyOutcome[] {
    return [...this.lastOutcomes]
  }

  /**
   * Per-strategy execution timings across every run of this scraper.
   */
  getPerformanceSummary(): Record<string, StrategyTiming> {
    const summary: Record<string, StrategyTiming> = {}
    for (const [strategy, timings] of this.timings) {
      summary[strategy] = {
        avgMs: timings.reduce((sum, ms) => sum + ms, 0) / timings.length,
        minMs: Math.min(...timings),
        maxMs: Math.max(...timings),
        count: timings.length,
      }
    }
    return summary
  }

  private clean(input: RawRecord[], limit: number): { records: RawRecord[]; dropped: number; duplicates: number } {
    const records: RawRecord[] = []
    const seen = new Set<string>()
    let dropped = 0
    let duplicates = 0

    for (const record of input) {
      if (records.length >= limit) break

      const title = record.title.trim()
      if (!title) {
        dropped++
        continue
      }
      if (seen.has(record.externalId)) {
        duplicates++
        continue
      }
      seen.add(record.externalId)

      const documentUrls = record.documentUrls
        .map((href) => resolveUrl(href, this.baseUrl))
        .filter((href): href is string => href !== undefined)

      records.push({
        ...record,
        title,
        portal: this.name,
        documentUrls: Array.from(new Set(documentUrls)),
        url: resolveUrl(record.url, this.baseUrl),
      })
    }

    if (dropped > 0 || duplicates > 0) {
      this.log.debug('Cleaned records', { dropped, duplicates })
    }

    return { records, dropped, duplicates }
  }
}
