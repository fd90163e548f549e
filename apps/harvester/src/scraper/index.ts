/**
 * Acquisition Core
 *
 * Politeness, transport, strategy chain, portal scrapers and the
 * orchestrator that runs them.
 */

// Core types
export * from './types.js'
export * from './errors.js'

// Orchestration
export { AcquisitionOrchestrator } from './orchestrator.js'
export type { FromConfigOptions, OrchestratorOptions, OrchestratorStatus, PortalInfo, RunSummary } from './orchestrator.js'
export { PortalRegistry } from './registry.js'
export type { PortalEntry } from './registry.js'
export { PortalScraper, computeCompleteness } from './portal-scraper.js'
export type { StrategyTiming } from './portal-scraper.js'
export { StrategyChain } from './chain.js'

// Strategies
export * from './strategies/index.js'

// Politeness
export { PolitenessEngine, DEFAULT_OFF_PEAK } from './politeness/engine.js'
export type { PolitenessOptions } from './politeness/engine.js'
export { RobotsPolicy, parseRobotsTxt, isPathAllowed } from './politeness/robots.js'

// Transport
export { Transport, DEFAULT_RETRY_POLICY } from './fetch/transport.js'
export type { AutomationSession, RetryPolicy, TransportOptions } from './fetch/transport.js'
export { HttpFetcher } from './fetch/http-fetcher.js'
export { BrowserPool, launchChromium } from './fetch/browser-pool.js'
export type { BrowserHandle, BrowserLauncher, BrowserPage } from './fetch/browser-pool.js'
export { UserAgentRotator } from './fetch/user-agents.js'

// Collaborators
export { CompositeAuditSink, InMemoryAuditSink, LoggingAuditSink, safeRecord } from './audit.js'
export { InMemoryOpportunityStore } from './store.js'

// Utilities
export { isValidUrl, getRegistrableDomain } from './utils/url.js'
