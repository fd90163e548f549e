import type { PortalSelectors, RenderedDomStrategyConfig } from '../../config/schema.js'
import type { Transport } from '../fetch/transport.js'
import type { AcquisitionStrategy, PortalTarget, RawRecord, StrategyContext } from '../types.js'
import { recordsFromHtml } from './extract.js'

/**
 * Renders the listing in the headless browser, then parses the resulting
 * DOM the same way as the static strategy.
 */
export class RenderedDomStrategy implements AcquisitionStrategy {
  readonly type = 'rendered-dom' as const
  readonly name: string
  readonly priority: number

  constructor(
    private readonly config: RenderedDomStrategyConfig,
    private readonly transport: Transport,
    private readonly selectors: PortalSelectors,
    private readonly defaultWaitAfterLoadMs: number,
    priority: number
  ) {
    this.name = config.name ?? 'rendered-dom'
    this.priority = config.priority ?? priority
  }

  isAvailable(): boolean {
    return this.config.enabled && this.transport.browserAvailable
  }

  async execute(portal: PortalTarget, limit: number, ctx: StrategyContext): Promise<RawRecord[]> {
    const url = this.config.url ?? portal.searchUrl
    const response = await this.transport.fetch(url, 'browser', {
      strategyName: this.name,
      portal: portal.name,
      waitForSelector: this.config.waitForSelector ?? this.selectors.list,
      waitAfterLoadMs: this.config.waitAfterLoadMs ?? this.defaultWaitAfterLoadMs,
      signal: ctx.signal,
    })

    return recordsFromHtml(
      response.body,
      this.selectors,
      { strategy: this.name, baseUrl: response.url, extractedAt: new Date() },
      limit
    )
  }
}
