/**
 * Acquisition Core Types
 *
 * Shared records, strategy contracts and collaborator interfaces for the
 * politeness, transport, strategy chain, portal scraper and orchestrator
 * layers.
 */

import type { ILogger } from '@bidwatch/logger'
import type { AcquisitionErrorKind } from './errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Portal-agnostic bag of extracted fields.
 * Produced by a strategy, enriched with portal identity by the Portal Scraper.
 */
export interface RawRecord {
  title: string
  externalId: string
  issuingEntity: string
  postedAt?: Date
  dueAt?: Date
  description?: string
  /** Absolute URLs of attached solicitation documents */
  documentUrls: string[]
  /** Detail page for the opportunity, when the source exposes one */
  url?: string
  /** Name of the strategy that produced the record (provenance) */
  sourceStrategy: string
  extractedAt: Date
  /** Portal name, attached by the Portal Scraper */
  portal?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Politeness
// ═══════════════════════════════════════════════════════════════════════════════

export interface OffPeakWindow {
  /** "HH:MM", local time */
  start: string
  /** "HH:MM", local time; may be earlier than start (window wraps midnight) */
  end: string
}

export interface DomainPoliteness {
  domain: string
  lastRequestAt: number | null
  minIntervalSeconds: number
  offPeakWindow: OffPeakWindow
}

export interface PolitenessStats {
  cachedRobotsDomains: string[]
  domainDelays: Record<string, number>
  lastRequestTimes: Record<string, string>
  offPeakHours: OffPeakWindow
  respectRobotsTxt: boolean
}

// ═══════════════════════════════════════════════════════════════════════════════
// Transport
// ═══════════════════════════════════════════════════════════════════════════════

export type TransportBackend = 'http' | 'browser'

export type HttpMethod = 'GET' | 'POST'

export interface FetchOptions {
  /** Strategy issuing the request, recorded on every FetchAttempt */
  strategyName: string
  /** Portal the request belongs to, recorded on every FetchAttempt */
  portal?: string
  method?: HttpMethod
  headers?: Record<string, string>
  body?: string
  /** Per-attempt timeout in ms (default from configuration) */
  timeoutMs?: number
  signal?: AbortSignal
  /** Browser backend only: selector that signals the content has rendered */
  waitForSelector?: string
  /** Browser backend only: extra settle time after load */
  waitAfterLoadMs?: number
}

export interface TransportResponse {
  url: string
  status: number
  body: string
  contentType: string | null
  backend: TransportBackend
  latencyMs: number
  /** Physical attempts used, including the successful one */
  attempts: number
}

/**
 * One physical request (each retry is its own attempt). Immutable.
 */
export interface FetchAttempt {
  readonly url: string
  readonly portal: string | null
  readonly strategyName: string
  readonly backend: TransportBackend
  readonly startedAt: Date
  readonly httpStatus: number | null
  readonly latencyMs: number
  readonly succeeded: boolean
  readonly errorKind: AcquisitionErrorKind | null
  readonly errorMessage: string | null
  readonly userAgent: string
  readonly robotsTxtRespected: boolean
  readonly appliedDelaySeconds: number
  /** 0-based attempt index within one logical fetch */
  readonly attempt: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Strategies
// ═══════════════════════════════════════════════════════════════════════════════

export type StrategyType =
  | 'graphql'
  | 'export'
  | 'static-html'
  | 'rendered-dom'
  | 'browser-automation'

/**
 * Portal identity handed to strategies.
 */
export interface PortalTarget {
  name: string
  baseUrl: string
  searchUrl: string
}

export interface StrategyContext {
  signal?: AbortSignal
  logger: ILogger
}

/**
 * One way of acquiring records from a portal.
 * Stateless beyond its own client configuration.
 */
export interface AcquisitionStrategy {
  readonly name: string
  readonly type: StrategyType
  /** Lower runs first */
  readonly priority: number
  isAvailable(): boolean
  execute(portal: PortalTarget, limit: number, ctx: StrategyContext): Promise<RawRecord[]>
}

export type StrategyOutcomeStatus = 'records' | 'empty' | 'failed' | 'unavailable'

export interface StrategyOutcome {
  strategy: string
  status: StrategyOutcomeStatus
  recordCount: number
  durationMs: number
  errorKind?: AcquisitionErrorKind
  error?: string
}

export interface AcquireResult {
  records: RawRecord[]
  /** null when every strategy was exhausted */
  strategyUsed: string | null
  outcomes: StrategyOutcome[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Portal scraper and orchestration
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * What the orchestrator needs from a portal scraper.
 */
export interface PortalRunner {
  readonly name: string
  readonly baseUrl: string
  run(limit: number, signal?: AbortSignal): Promise<RawRecord[]>
}

export interface PortalRunStats {
  recordsFound: number
  lastRunDurationMs: number | null
  lastStrategy: string | null
  averageCompleteness: number | null
  runs: number
}

export type ScrapingStatus = 'starting' | 'running' | 'completed' | 'failed' | 'cancelled'

export interface ScrapingProgress {
  portal: string
  status: ScrapingStatus
  percentComplete: number
  recordsFound: number
  message: string
}

export interface ScrapingResult {
  portal: string
  success: boolean
  recordCount: number
  errorMessage?: string
  durationMs: number
  records: RawRecord[]
  cancelled?: boolean
  storedCount?: number
}

export type ProgressSubscriber = (progress: ScrapingProgress) => void

// ═══════════════════════════════════════════════════════════════════════════════
// External collaborators
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Write-only audit trail of fetch attempts. Fire-and-forget.
 */
export interface AuditSink {
  record(attempt: FetchAttempt): void | Promise<void>
}

export interface Opportunity {
  id: string
  portal: string
  title: string
  externalId: string
  issuingEntity: string
  postedAt?: Date
  dueAt?: Date
  description?: string
  documentUrls: string[]
  url?: string
  sourceStrategy: string
  firstSeenAt: Date
  lastSeenAt: Date
}

export interface OpportunityFilters {
  portal?: string
  /** Case-insensitive match on title, description or issuing entity */
  text?: string
  dueAfter?: Date
  dueBefore?: Date
  limit?: number
}

export interface StoreOutcome {
  storedCount: number
  opportunityIds: string[]
}

/**
 * Persistence collaborator. The core never issues queries itself.
 */
export interface OpportunityStore {
  store(portalName: string, records: RawRecord[]): Promise<StoreOutcome>
  query(filters: OpportunityFilters): Promise<Opportunity[]>
}

export interface AnalysisResult {
  opportunityId: string
  summary?: string
  relevance?: number
  [key: string]: unknown
}

/**
 * Optional post-processing enrichment. Fails independently of acquisition.
 */
export interface AnalysisService {
  analyze(opportunityId: string): Promise<AnalysisResult>
}
