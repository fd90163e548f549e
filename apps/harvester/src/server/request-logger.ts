/**
 * HTTP Request Logger Middleware
 *
 * One structured log entry per request, at response finish.
 * Event name: http.request.end
 */

import type { NextFunction, Request, Response } from 'express'
import { loggers } from '../config/logger.js'

const log = loggers.server

const SKIP_PATHS = new Set(['/health', '/favicon.ico'])

function getRoute(req: Request): string {
  const pattern: unknown = req.route?.path
  if (typeof pattern === 'string') {
    return `${req.baseUrl}${pattern}`
  }
  return req.path
}

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (SKIP_PATHS.has(req.path)) {
    return next()
  }

  const startTime = process.hrtime.bigint()

  res.on('finish', () => {
    const latencyMs = Math.round((Number(process.hrtime.bigint() - startTime) / 1_000_000) * 100) / 100

    const entry = {
      event_name: 'http.request.end',
      http: {
        method: req.method,
        route: getRoute(req),
        path: req.path,
        status_code: res.statusCode,
        latency_ms: latencyMs,
      },
    }

    if (res.statusCode >= 500) {
      log.error('Request completed with error', entry)
    } else if (res.statusCode >= 400) {
      log.warn('Request completed with client error', entry)
    } else {
      log.info('Request completed', entry)
    }
  })

  next()
}
