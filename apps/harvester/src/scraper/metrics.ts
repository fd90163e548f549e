/**
 * Acquisition Metrics
 *
 * No metrics backend; these are structured log events with an
 * `event_name` field so log tooling can count and alert on them.
 */

import { loggers } from '../config/logger.js'
import type { StrategyOutcome } from './types.js'

const log = loggers.portal

export const LOW_COMPLETENESS_THRESHOLD = 0.8

export interface PortalRunCompletedPayload {
  portal: string
  strategyUsed: string | null
  recordCount: number
  droppedRecords: number
  duplicateRecords: number
  averageCompleteness: number | null
  durationMs: number
  outcomes: StrategyOutcome[]
}

export function recordPortalRunCompleted(payload: PortalRunCompletedPayload): void {
  log.info('PORTAL_RUN_COMPLETED', {
    event_name: 'PORTAL_RUN_COMPLETED',
    ...payload,
    outcomes: payload.outcomes.map((outcome) => `${outcome.strategy}:${outcome.status}`),
  })

  if (payload.averageCompleteness !== null && payload.averageCompleteness < LOW_COMPLETENESS_THRESHOLD) {
    log.warn('PORTAL_ALERT_LOW_QUALITY', {
      event_name: 'PORTAL_ALERT_LOW_QUALITY',
      portal: payload.portal,
      strategyUsed: payload.strategyUsed,
      averageCompleteness: payload.averageCompleteness,
      threshold: LOW_COMPLETENESS_THRESHOLD,
    })
  }

  if (payload.recordCount === 0) {
    log.warn('PORTAL_RUN_EMPTY', {
      event_name: 'PORTAL_RUN_EMPTY',
      portal: payload.portal,
      durationMs: payload.durationMs,
    })
  }
}

export function recordPortalRunFailed(payload: { portal: string; error: string; durationMs: number }): void {
  loggers.orchestrator.error('PORTAL_RUN_FAILED', {
    event_name: 'PORTAL_RUN_FAILED',
    ...payload,
  })
}

export function recordPortalRunCancelled(payload: { portal: string; durationMs: number }): void {
  loggers.orchestrator.warn('PORTAL_RUN_CANCELLED', {
    event_name: 'PORTAL_RUN_CANCELLED',
    ...payload,
  })
}

export function recordStoreFailed(payload: { portal: string; recordCount: number; error: string }): void {
  loggers.orchestrator.error('PORTAL_STORE_FAILED', {
    event_name: 'PORTAL_STORE_FAILED',
    ...payload,
  })
}

export function recordAnalysisSummary(payload: {
  portal: string
  analyzed: number
  failed: number
}): void {
  const level = payload.failed > 0 ? 'warn' : 'info'
  loggers.orchestrator[level]('PORTAL_ANALYSIS_COMPLETED', {
    event_name: 'PORTAL_ANALYSIS_COMPLETED',
    ...payload,
  })
}
