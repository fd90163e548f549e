/**
 * Fetch Attempt Audit Sinks
 *
 * Every physical request produces one FetchAttempt. Sinks are write-only and
 * best-effort: `safeRecord` guarantees a sink failure never reaches the
 * transport.
 */

import type { ILogger } from '@bidwatch/logger'
import { loggers } from '../config/logger.js'
import type { AuditSink, FetchAttempt } from './types.js'

/**
 * Hand an attempt to a sink without letting it throw or block the caller.
 * Async sinks are not awaited.
 */
export function safeRecord(sink: AuditSink | undefined, attempt: FetchAttempt, log: ILogger = loggers.audit): void {
  if (!sink) return

  try {
    const result = sink.record(attempt)
    if (result instanceof Promise) {
      void result.catch((error: unknown) => {
        log.warn('Audit sink rejected attempt', { url: attempt.url }, error)
      })
    }
  } catch (error) {
    log.warn('Audit sink threw', { url: attempt.url }, error)
  }
}

/**
 * Writes each attempt as a structured FETCH_ATTEMPT log line.
 * Failed attempts log at warn.
 */
export class LoggingAuditSink implements AuditSink {
  constructor(private readonly log: ILogger = loggers.audit) {}

  record(attempt: FetchAttempt): void {
    const meta = {
      event_name: 'FETCH_ATTEMPT',
      url: attempt.url,
      portal: attempt.portal,
      strategy: attempt.strategyName,
      backend: attempt.backend,
      attempt: attempt.attempt,
      httpStatus: attempt.httpStatus,
      latencyMs: attempt.latencyMs,
      succeeded: attempt.succeeded,
      errorKind: attempt.errorKind,
      errorMessage: attempt.errorMessage,
      userAgent: attempt.userAgent,
      robotsTxtRespected: attempt.robotsTxtRespected,
      appliedDelaySeconds: attempt.appliedDelaySeconds,
    }

    if (attempt.succeeded) {
      this.log.debug('Fetch attempt', meta)
    } else {
      this.log.warn('Fetch attempt failed', meta)
    }
  }
}

/**
 * Keeps the most recent attempts in memory (ring buffer).
 */
export class InMemoryAuditSink implements AuditSink {
  private readonly buffer: FetchAttempt[] = []

  constructor(readonly capacity = 500) {}

  record(attempt: FetchAttempt): void {
    this.buffer.push(attempt)
    if (this.buffer.length > this.capacity) {
      this.buffer.splice(0, this.buffer.length - this.capacity)
    }
  }

  /**
   * Newest last. `limit` takes the most recent n.
   */
  list(filter: { portal?: string; failedOnly?: boolean; limit?: number } = {}): FetchAttempt[] {
    let attempts = this.buffer
    if (filter.portal) {
      attempts = attempts.filter((attempt) => attempt.portal === filter.portal)
    }
    if (filter.failedOnly) {
      attempts = attempts.filter((attempt) => !attempt.succeeded)
    }
    if (filter.limit !== undefined) {
      attempts = attempts.slice(Math.max(0, attempts.length - filter.limit))
    }
    return [...attempts]
  }

  get size(): number {
    return this.buffer.length
  }

  clear(): void {
    this.buffer.length = 0
  }
}

/**
 * Fans an attempt out to several sinks; one failing sink does not starve the others.
 */
export class CompositeAuditSink implements AuditSink {
  private readonly sinks: AuditSink[]

  constructor(sinks: AuditSink[], private readonly log: ILogger = loggers.audit) {
    this.sinks = sinks
  }

  record(attempt: FetchAttempt): void {
    for (const sink of this.sinks) {
      safeRecord(sink, attempt, this.log)
    }
  }
}
