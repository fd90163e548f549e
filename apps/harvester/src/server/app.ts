/**
 * Status Server (without server startup)
 *
 * Thin HTTP surface over one orchestrator: health, status, portal info,
 * recent fetch attempts, stored opportunities, and run triggers. Exported
 * for supertest; index.ts does the listen().
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express'
import helmet from 'helmet'
import { z } from 'zod'
import { loggers } from '../config/logger.js'
import { toUserMessage } from '../scraper/errors.js'
import type { AcquisitionOrchestrator } from '../scraper/orchestrator.js'
import type { OpportunityStore, ScrapingResult } from '../scraper/types.js'
import { requestLoggerMiddleware } from './request-logger.js'

const log = loggers.server

const DEFAULT_RUN_LIMIT = 50

const runRequestSchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
})

const waitSchema = z.object({
  wait: z.enum(['true', 'false']).optional(),
})

const auditQuerySchema = z.object({
  portal: z.string().min(1).optional(),
  failedOnly: z.enum(['true', 'false']).optional(),
  limit: z.coerce.number().int().positive().max(500).default(100),
})

const opportunityQuerySchema = z.object({
  portal: z.string().min(1).optional(),
  q: z.string().min(1).optional(),
  dueAfter: z.coerce.date().optional(),
  dueBefore: z.coerce.date().optional(),
  limit: z.coerce.number().int().positive().max(500).default(100),
})

export interface AppOptions {
  store?: OpportunityStore
}

type Handler = (req: Request, res: Response) => Promise<void> | void

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next)
  }
}

function summarize(result: ScrapingResult) {
  const { records: _records, ...summary } = result
  return summary
}

function parseLimit(body: unknown): number | string {
  const parsed = runRequestSchema.safeParse(body ?? {})
  if (!parsed.success) {
    return parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
  }
  return parsed.data.limit ?? DEFAULT_RUN_LIMIT
}

function wantsWait(query: unknown): boolean {
  const parsed = waitSchema.safeParse(query)
  return parsed.success && parsed.data.wait === 'true'
}

export function createApp(orchestrator: AcquisitionOrchestrator, options: AppOptions = {}): Express {
  const app = express()

  app.use(helmet())
  app.use(express.json())
  app.use(requestLoggerMiddleware)

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() })
  })

  app.get('/status', (_req, res) => {
    res.json(orchestrator.getStatus())
  })

  app.get('/portals', (_req, res) => {
    res.json({ portals: orchestrator.listPortals() })
  })

  app.get('/portals/:portal', (req, res) => {
    const info = orchestrator.getPortalInfo(req.params.portal)
    if (!info) {
      res.status(404).json({ error: `Unknown portal '${req.params.portal}'` })
      return
    }
    res.json(info)
  })

  app.get('/audit', (req, res) => {
    const parsed = auditQuerySchema.safeParse(req.query)
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid query', issues: parsed.error.issues.map((issue) => issue.message) })
      return
    }

    const attempts =
      orchestrator.auditLog?.list({
        portal: parsed.data.portal,
        failedOnly: parsed.data.failedOnly === 'true',
        limit: parsed.data.limit,
      }) ?? []
    res.json({ attempts })
  })

  app.get(
    '/opportunities',
    route(async (req, res) => {
      if (!options.store) {
        res.status(404).json({ error: 'No opportunity store configured' })
        return
      }

      const parsed = opportunityQuerySchema.safeParse(req.query)
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid query', issues: parsed.error.issues.map((issue) => issue.message) })
        return
      }

      const { q, ...filters } = parsed.data
      const opportunities = await options.store.query({ ...filters, text: q })
      res.json({ opportunities })
    })
  )

  app.post(
    '/runs',
    route(async (req, res) => {
      const limit = parseLimit(req.body)
      if (typeof limit === 'string') {
        res.status(400).json({ error: limit })
        return
      }

      if (wantsWait(req.query)) {
        const results = await orchestrator.runAll(limit)
        res.json({ results: results.map(summarize) })
        return
      }

      const portals = orchestrator.getStatus().availablePortals
      orchestrator.runAll(limit).catch((error: unknown) => {
        log.error('Background run failed', {}, error)
      })
      res.status(202).json({ started: portals, limit })
    })
  )

  // Registered before /runs/:portal so "cancel" is not taken for a portal name
  app.post('/runs/cancel', (_req, res) => {
    res.json({ cancelled: orchestrator.cancel() })
  })

  app.post(
    '/runs/:portal',
    route(async (req, res) => {
      const { portal } = req.params
      if (!orchestrator.registry.has(portal)) {
        res.status(404).json({ error: `Unknown portal '${portal}'` })
        return
      }
      if (orchestrator.isRunning(portal)) {
        res.status(409).json({ error: `Portal '${portal}' is already running` })
        return
      }

      const limit = parseLimit(req.body)
      if (typeof limit === 'string') {
        res.status(400).json({ error: limit })
        return
      }

      if (wantsWait(req.query)) {
        const result = await orchestrator.runPortal(portal, limit)
        res.json(summarize(result))
        return
      }

      orchestrator.runPortal(portal, limit).catch((error: unknown) => {
        log.error('Background run failed', { portal }, error)
      })
      res.status(202).json({ portal, status: 'started', limit })
    })
  )

  app.post('/runs/:portal/cancel', (req, res) => {
    const cancelled = orchestrator.cancel(req.params.portal)
    if (cancelled === 0) {
      res.status(404).json({ error: `No active run for portal '${req.params.portal}'` })
      return
    }
    res.json({ cancelled })
  })

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' })
  })

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    log.error('Request failed', { method: req.method, path: req.path }, error)
    res.status(500).json({ error: toUserMessage(error) })
  })

  return app
}
