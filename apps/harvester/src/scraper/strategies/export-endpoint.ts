import type { ExportStrategyConfig, FieldMappings } from '../../config/schema.js'
import { ParseError } from '../errors.js'
import type { Transport } from '../fetch/transport.js'
import type { AcquisitionStrategy, PortalTarget, RawRecord, StrategyContext } from '../types.js'
import { withQuery } from '../utils/url.js'
import { findItems, parseJson, recordsFromJson } from './extract.js'
import { resolveEndpoint } from './graphql.js'

/**
 * Pulls the JSON export a portal offers for its listing (REST).
 */
export class ExportEndpointStrategy implements AcquisitionStrategy {
  readonly type = 'export' as const
  readonly name: string
  readonly priority: number

  constructor(
    private readonly config: ExportStrategyConfig,
    private readonly transport: Transport,
    private readonly fieldMappings: FieldMappings,
    priority: number
  ) {
    this.name = config.name ?? 'export'
    this.priority = config.priority ?? priority
  }

  isAvailable(): boolean {
    return this.config.enabled
  }

  async execute(portal: PortalTarget, limit: number, ctx: StrategyContext): Promise<RawRecord[]> {
    const url = withQuery(resolveEndpoint(this.config.endpoint, portal.baseUrl), {
      ...this.config.params,
      [this.config.limitParam]: limit,
    })

    const response = await this.transport.fetch(url, 'http', {
      strategyName: this.name,
      portal: portal.name,
      headers: { Accept: 'application/json' },
      signal: ctx.signal,
    })

    if (response.contentType && !response.contentType.includes('json')) {
      throw new ParseError(`Export returned non-JSON content: ${response.contentType}`, { url })
    }

    const items = findItems(parseJson(response.body, url), url, this.config.resultPath)
    return recordsFromJson(
      items,
      this.fieldMappings,
      { strategy: this.name, baseUrl: portal.baseUrl, extractedAt: new Date() },
      limit
    )
  }
}
