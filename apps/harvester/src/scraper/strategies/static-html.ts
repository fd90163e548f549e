import type { PortalSelectors, StaticHtmlStrategyConfig } from '../../config/schema.js'
import type { Transport } from '../fetch/transport.js'
import type { AcquisitionStrategy, PortalTarget, RawRecord, StrategyContext } from '../types.js'
import { recordsFromHtml } from './extract.js'

/**
 * Parses the server-rendered listing page with cheerio.
 */
export class StaticHtmlStrategy implements AcquisitionStrategy {
  readonly type = 'static-html' as const
  readonly name: string
  readonly priority: number

  constructor(
    private readonly config: StaticHtmlStrategyConfig,
    private readonly transport: Transport,
    private readonly selectors: PortalSelectors,
    priority: number
  ) {
    this.name = config.name ?? 'static-html'
    this.priority = config.priority ?? priority
  }

  isAvailable(): boolean {
    return this.config.enabled
  }

  async execute(portal: PortalTarget, limit: number, ctx: StrategyContext): Promise<RawRecord[]> {
    const url = this.config.url ?? portal.searchUrl
    const response = await this.transport.fetch(url, 'http', {
      strategyName: this.name,
      portal: portal.name,
      headers: { Accept: 'text/html,application/xhtml+xml' },
      signal: ctx.signal,
    })

    const records = recordsFromHtml(
      response.body,
      this.selectors,
      { strategy: this.name, baseUrl: response.url, extractedAt: new Date() },
      limit
    )
    if (records.length === 0) {
      ctx.logger.debug('No listing matched', { url, selector: this.selectors.list })
    }
    return records
  }
}
