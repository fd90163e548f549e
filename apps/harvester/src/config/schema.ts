/**
 * Configuration schema
 *
 * Validated with zod at load time; every type the rest of the harvester
 * consumes is inferred from here.
 */

import { z } from 'zod'

const clockTime = z.string().regex(/^([01]?\d|2[0-3]):([0-5]\d)$/, 'expected HH:MM')

export const DEFAULT_USER_AGENT = 'BidwatchBot/1.0 (+https://example.org/bidwatch/bot)'

/** Generic listing containers tried after the configured list selector */
export const GENERIC_LIST_SELECTORS = [
  '.solicitation-item',
  '.opportunity-item',
  '.bid-item',
  '[data-opportunity]',
  '.card',
  '.listing-item',
]

export const scrapingSchema = z.object({
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  /** Extra agents rotated alongside the declared one */
  userAgentPool: z.array(z.string().min(1)).optional(),
  requestDelaySeconds: z.number().nonnegative().default(3),
  offPeakHours: z
    .object({ start: clockTime, end: clockTime })
    .default({ start: '23:00', end: '06:00' }),
  domainOverrides: z.record(z.number().nonnegative()).default({}),
  timeoutMs: z.number().int().positive().default(30000),
  maxRetries: z.number().int().nonnegative().default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(1000),
  maxBackoffMs: z.number().int().positive().default(30000),
  respectRobotsTxt: z.boolean().default(true),
  honorCrawlDelay: z.boolean().default(true),
  maxResponseBytes: z.number().int().positive().default(10 * 1024 * 1024),
})

export const browserSchema = z.object({
  enabled: z.boolean().default(false),
  headless: z.boolean().default(true),
  poolSize: z.number().int().positive().default(2),
  navigationTimeoutMs: z.number().int().positive().default(30000),
  maxInteractionMs: z.number().int().positive().default(120000),
  waitAfterLoadMs: z.number().int().nonnegative().default(0),
})

export const selectorsSchema = z.object({
  list: z.string().default('.solicitation-item'),
  fallbackLists: z.array(z.string()).default(GENERIC_LIST_SELECTORS),
  title: z.string().default('.solicitation-title, .opportunity-title, .bid-title, h3, h4, .title'),
  externalId: z.string().default('.solicitation-number, .bid-number, .opportunity-number'),
  issuingEntity: z.string().default('.agency-name, .organization, .department'),
  postedAt: z.string().optional(),
  dueAt: z.string().default('.due-date, .deadline, .closing-date'),
  description: z.string().default('.solicitation-description, .opportunity-description, .summary'),
  documentLinks: z.string().default("a[href*='.pdf'], a[href*='.doc'], a[href*='.docx']"),
  detailLink: z.string().default('a[href]'),
})

const fieldKeys = z.array(z.string().min(1)).min(1)

/** Ordered source keys (dot paths allowed) per record field, for JSON sources */
export const fieldMappingsSchema = z.object({
  title: fieldKeys.optional(),
  externalId: fieldKeys.optional(),
  issuingEntity: fieldKeys.optional(),
  postedAt: fieldKeys.optional(),
  dueAt: fieldKeys.optional(),
  description: fieldKeys.optional(),
  documentUrls: fieldKeys.optional(),
  url: fieldKeys.optional(),
})

const strategyBase = {
  name: z.string().min(1).optional(),
  enabled: z.boolean().default(true),
  priority: z.number().int().optional(),
}

export const graphqlStrategySchema = z.object({
  ...strategyBase,
  type: z.literal('graphql'),
  /** Path relative to the portal base URL, or absolute */
  endpoint: z.string().min(1),
  query: z.string().min(1),
  variables: z.record(z.unknown()).default({}),
  limitVariable: z.string().default('limit'),
  resultPath: z.string().default('data.solicitations'),
})

export const exportStrategySchema = z.object({
  ...strategyBase,
  type: z.literal('export'),
  endpoint: z.string().min(1),
  params: z.record(z.string()).default({}),
  limitParam: z.string().default('limit'),
  /** When omitted the item list is found at the root or a common wrapper key */
  resultPath: z.string().optional(),
})

export const staticHtmlStrategySchema = z.object({
  ...strategyBase,
  type: z.literal('static-html'),
  /** Defaults to the portal search URL */
  url: z.string().url().optional(),
})

export const renderedDomStrategySchema = z.object({
  ...strategyBase,
  type: z.literal('rendered-dom'),
  url: z.string().url().optional(),
  /** Defaults to the list selector */
  waitForSelector: z.string().optional(),
  waitAfterLoadMs: z.number().int().nonnegative().optional(),
})

export const browserAutomationStrategySchema = z.object({
  ...strategyBase,
  type: z.literal('browser-automation'),
  url: z.string().url().optional(),
  nextSelector: z.string().optional(),
  maxPages: z.number().int().positive().default(5),
  waitAfterLoadMs: z.number().int().nonnegative().optional(),
})

export const strategySchema = z.discriminatedUnion('type', [
  graphqlStrategySchema,
  exportStrategySchema,
  staticHtmlStrategySchema,
  renderedDomStrategySchema,
  browserAutomationStrategySchema,
])

export const portalSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'lowercase letters, digits, _ and - only'),
  displayName: z.string().optional(),
  enabled: z.boolean().default(true),
  priority: z.number().int().default(100),
  baseUrl: z.string().url(),
  searchUrl: z.string().url().optional(),
  strategies: z.array(strategySchema).min(1),
  selectors: selectorsSchema.default({}),
  fieldMappings: fieldMappingsSchema.default({}),
})

export const harvesterConfigSchema = z
  .object({
    scraping: scrapingSchema.default({}),
    browser: browserSchema.default({}),
    portals: z.array(portalSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>()
    config.portals.forEach((portal, index) => {
      if (seen.has(portal.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['portals', index, 'name'],
          message: `duplicate portal name '${portal.name}'`,
        })
      }
      seen.add(portal.name)
    })
  })

export type ScrapingSettings = z.infer<typeof scrapingSchema>
export type BrowserSettings = z.infer<typeof browserSchema>
export type PortalSelectors = z.infer<typeof selectorsSchema>
export type FieldMappings = z.infer<typeof fieldMappingsSchema>
export type GraphqlStrategyConfig = z.infer<typeof graphqlStrategySchema>
export type ExportStrategyConfig = z.infer<typeof exportStrategySchema>
export type StaticHtmlStrategyConfig = z.infer<typeof staticHtmlStrategySchema>
export type RenderedDomStrategyConfig = z.infer<typeof renderedDomStrategySchema>
export type BrowserAutomationStrategyConfig = z.infer<typeof browserAutomationStrategySchema>
export type StrategyConfig = z.infer<typeof strategySchema>
export type PortalConfig = z.infer<typeof portalSchema>
export type HarvesterConfig = z.infer<typeof harvesterConfigSchema>
export type HarvesterConfigInput = z.input<typeof harvesterConfigSchema>
