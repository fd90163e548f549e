import type { FieldMappings, GraphqlStrategyConfig } from '../../config/schema.js'
import { ParseError } from '../errors.js'
import type { Transport } from '../fetch/transport.js'
import type { AcquisitionStrategy, PortalTarget, RawRecord, StrategyContext } from '../types.js'
import { asText, findItems, parseJson, readPath, recordsFromJson } from './extract.js'

export function resolveEndpoint(endpoint: string, baseUrl: string): string {
  return new URL(endpoint, baseUrl).toString()
}

function describeGraphqlErrors(errors: unknown): string | null {
  if (!Array.isArray(errors) || errors.length === 0) return null
  return errors.map((error) => asText(readPath(error, 'message')) ?? 'unknown error').join('; ')
}

/**
 * Queries a portal's internal GraphQL API. The most structured source, so it
 * runs first when configured.
 */
export class GraphqlStrategy implements AcquisitionStrategy {
  readonly type = 'graphql' as const
  readonly name: string
  readonly priority: number

  constructor(
    private readonly config: GraphqlStrategyConfig,
    private readonly transport: Transport,
    private readonly fieldMappings: FieldMappings,
    priority: number
  ) {
    this.name = config.name ?? 'graphql'
    this.priority = config.priority ?? priority
  }

  isAvailable(): boolean {
    return this.config.enabled
  }

  async execute(portal: PortalTarget, limit: number, ctx: StrategyContext): Promise<RawRecord[]> {
    const url = resolveEndpoint(this.config.endpoint, portal.baseUrl)
    const body = JSON.stringify({
      query: this.config.query,
      variables: { ...this.config.variables, [this.config.limitVariable]: limit },
    })

    const response = await this.transport.fetch(url, 'http', {
      strategyName: this.name,
      portal: portal.name,
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body,
      signal: ctx.signal,
    })

    const payload = parseJson(response.body, url)
    const graphqlErrors = describeGraphqlErrors(readPath(payload, 'errors'))
    if (graphqlErrors && readPath(payload, this.config.resultPath) === undefined) {
      throw new ParseError(`GraphQL errors: ${graphqlErrors}`, { url })
    }

    const items = findItems(payload, url, this.config.resultPath)
    ctx.logger.debug('GraphQL items received', { count: items.length })

    return recordsFromJson(
      items,
      this.fieldMappings,
      { strategy: this.name, baseUrl: portal.baseUrl, extractedAt: new Date() },
      limit
    )
  }
}
