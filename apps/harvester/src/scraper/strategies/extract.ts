/**
 * Record extraction shared by the strategies.
 *
 * JSON sources map fields through ordered fallback keys; HTML sources go
 * through cheerio with a list selector plus per-field selectors. Both yield
 * RawRecords tagged with the producing strategy.
 */

import { createHash } from 'node:crypto'
import * as cheerio from 'cheerio'
import type { AnyNode } from 'domhandler'
import { z } from 'zod'
import type { FieldMappings, PortalSelectors } from '../../config/schema.js'
import { ParseError, classifyError } from '../errors.js'
import type { RawRecord } from '../types.js'
import { resolveUrl } from '../utils/url.js'

export interface ExtractionMeta {
  strategy: string
  /** Base for resolving relative links */
  baseUrl: string
  extractedAt: Date
}

type RecordField = keyof FieldMappings

export const DEFAULT_FIELD_MAPPINGS: Record<RecordField, string[]> = {
  title: ['title', 'name', 'solicitationTitle', 'solicitation_title', 'projectName', 'project_name'],
  externalId: [
    'bidNumber',
    'bid_number',
    'solicitationNumber',
    'solicitation_number',
    'referenceNumber',
    'reference_number',
    'opportunityId',
    'id',
  ],
  issuingEntity: ['agency', 'agencyName', 'agency_name', 'organization', 'department', 'entity'],
  postedAt: ['postedDate', 'posted_date', 'releaseDate', 'release_date', 'publishedAt'],
  dueAt: ['deadline', 'dueDate', 'due_date', 'closingDate', 'closing_date', 'submissionDeadline'],
  description: ['description', 'summary'],
  documentUrls: ['documentUrls', 'document_urls', 'documents', 'attachments'],
  url: ['url', 'link', 'detailUrl'],
}

/** Wrapper keys tried when an export endpoint has no configured result path */
const COMMON_LIST_KEYS = ['solicitations', 'opportunities', 'data', 'items', 'results']

const itemListSchema = z.array(z.record(z.unknown()))

export type JsonItem = Record<string, unknown>

export function parseJson(body: string, url: string): unknown {
  try {
    return JSON.parse(body)
  } catch (error) {
    throw classifyError(error, url)
  }
}

/**
 * Walk a dot path ("data.solicitations.items").
 */
export function readPath(value: unknown, path: string): unknown {
  let current = value
  for (const segment of path.split('.')) {
    if (typeof current !== 'object' || current === null || !(segment in current)) {
      return undefined
    }
    current = Reflect.get(current, segment)
  }
  return current
}

/**
 * Locate and validate the list of items in a JSON payload.
 *
 * @throws ParseError when the path is missing or the value is not a list of objects
 */
export function findItems(payload: unknown, url: string, resultPath?: string): JsonItem[] {
  let candidate: unknown
  if (resultPath) {
    candidate = readPath(payload, resultPath)
    if (candidate === undefined) {
      throw new ParseError(`Response has no '${resultPath}'`, { url })
    }
  } else if (Array.isArray(payload)) {
    candidate = payload
  } else {
    const key = COMMON_LIST_KEYS.find((name) => Array.isArray(readPath(payload, name)))
    if (!key) {
      throw new ParseError('Response contains no item list', { url })
    }
    candidate = readPath(payload, key)
  }

  const parsed = itemListSchema.safeParse(candidate)
  if (!parsed.success) {
    throw classifyError(parsed.error, url)
  }
  return parsed.data
}

export function asText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.replace(/\s+/g, ' ').trim()
    return trimmed || undefined
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  return undefined
}

export function parseDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value
  }
  const text = typeof value === 'number' ? value : asText(value)
  if (text === undefined) return undefined
  const parsed = new Date(text)
  return Number.isNaN(parsed.getTime()) ? undefined : parsed
}

/**
 * Strings, or objects carrying a url/href, flattened to a string list.
 */
export function asStringList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value]
  const out: string[] = []
  for (const item of items) {
    const direct = asText(item)
    if (direct) {
      out.push(direct)
      continue
    }
    const nested = asText(readPath(item, 'url')) ?? asText(readPath(item, 'href'))
    if (nested) out.push(nested)
  }
  return out
}

export function pickField(item: JsonItem, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = readPath(item, key)
    if (value === undefined || value === null) continue
    if (typeof value === 'string' && !value.trim()) continue
    if (Array.isArray(value) && value.length === 0) continue
    return value
  }
  return undefined
}

/**
 * Stable id for sources that expose none.
 */
export function fallbackExternalId(title: string, url?: string): string {
  return createHash('sha256')
    .update(`${title}|${url ?? ''}`)
    .digest('hex')
    .slice(0, 16)
}

function mappingFor(field: RecordField, mappings: FieldMappings): readonly string[] {
  return mappings[field] ?? DEFAULT_FIELD_MAPPINGS[field]
}

function resolveAll(urls: string[], baseUrl: string): string[] {
  return urls.map((href) => resolveUrl(href, baseUrl)).filter((href): href is string => href !== undefined)
}

/**
 * Map one JSON item to a record. Returns null when no title can be found.
 */
export function recordFromJson(item: JsonItem, mappings: FieldMappings, meta: ExtractionMeta): RawRecord | null {
  const title = asText(pickField(item, mappingFor('title', mappings)))
  if (!title) return null

  const url = resolveUrl(asText(pickField(item, mappingFor('url', mappings))), meta.baseUrl)

  return {
    title,
    externalId: asText(pickField(item, mappingFor('externalId', mappings))) ?? fallbackExternalId(title, url),
    issuingEntity: asText(pickField(item, mappingFor('issuingEntity', mappings))) ?? '',
    postedAt: parseDate(pickField(item, mappingFor('postedAt', mappings))),
    dueAt: parseDate(pickField(item, mappingFor('dueAt', mappings))),
    description: asText(pickField(item, mappingFor('description', mappings))),
    documentUrls: resolveAll(asStringList(pickField(item, mappingFor('documentUrls', mappings))), meta.baseUrl),
    url,
    sourceStrategy: meta.strategy,
    extractedAt: meta.extractedAt,
  }
}

export function recordsFromJson(
  items: JsonItem[],
  mappings: FieldMappings,
  meta: ExtractionMeta,
  limit: number
): RawRecord[] {
  const records: RawRecord[] = []
  for (const item of items) {
    if (records.length >= limit) break
    const record = recordFromJson(item, mappings, meta)
    if (record) records.push(record)
  }
  return records
}

/**
 * First list selector (configured, then generic fallbacks) matching anything.
 */
export function selectListing(
  $: cheerio.CheerioAPI,
  selectors: PortalSelectors
): { selector: string; elements: AnyNode[] } | null {
  for (const selector of [selectors.list, ...selectors.fallbackLists]) {
    const elements: AnyNode[] = $(selector).toArray()
    if (elements.length > 0) {
      return { selector, elements }
    }
  }
  return null
}

function textWithin($: cheerio.CheerioAPI, element: AnyNode, selector: string | undefined): string | undefined {
  if (!selector) return undefined
  return asText($(element).find(selector).first().text())
}

/**
 * Extract records from a listing page. An empty list means no listing
 * container matched.
 */
export function recordsFromHtml(
  html: string,
  selectors: PortalSelectors,
  meta: ExtractionMeta,
  limit: number
): RawRecord[] {
  const $ = cheerio.load(html)
  const listing = selectListing($, selectors)
  if (!listing) return []

  const records: RawRecord[] = []
  for (const element of listing.elements) {
    if (records.length >= limit) break

    const title = textWithin($, element, selectors.title) ?? asText($(element).find('a').first().text())
    if (!title) continue

    const url = resolveUrl($(element).find(selectors.detailLink).first().attr('href'), meta.baseUrl)
    const documentUrls = resolveAll(
      $(element)
        .find(selectors.documentLinks)
        .toArray()
        .map((link) => $(link).attr('href') ?? ''),
      meta.baseUrl
    )

    records.push({
      title,
      externalId: textWithin($, element, selectors.externalId) ?? fallbackExternalId(title, url),
      issuingEntity: textWithin($, element, selectors.issuingEntity) ?? '',
      postedAt: parseDate(textWithin($, element, selectors.postedAt)),
      dueAt: parseDate(textWithin($, element, selectors.dueAt)),
      description: textWithin($, element, selectors.description),
      documentUrls: Array.from(new Set(documentUrls)),
      url,
      sourceStrategy: meta.strategy,
      extractedAt: meta.extractedAt,
    })
  }

  return records
}
