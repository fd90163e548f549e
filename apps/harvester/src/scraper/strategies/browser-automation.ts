import type { BrowserAutomationStrategyConfig, PortalSelectors } from '../../config/schema.js'
import type { Transport } from '../fetch/transport.js'
import type { AcquisitionStrategy, PortalTarget, RawRecord, StrategyContext } from '../types.js'
import { throwIfCancelled } from '../utils/sleep.js'
import { recordsFromHtml } from './extract.js'

const CLICK_TIMEOUT_MS = 10000

/**
 * Last resort: drives the listing page, following the "next" control for up
 * to `maxPages` pages. Each page turn is checked, paced and audited like any
 * other request.
 */
export class BrowserAutomationStrategy implements AcquisitionStrategy {
  readonly type = 'browser-automation' as const
  readonly name: string
  readonly priority: number

  constructor(
    private readonly config: BrowserAutomationStrategyConfig,
    private readonly transport: Transport,
    private readonly selectors: PortalSelectors,
    private readonly defaultWaitAfterLoadMs: number,
    priority: number
  ) {
    this.name = config.name ?? 'browser-automation'
    this.priority = config.priority ?? priority
  }

  isAvailable(): boolean {
    return this.config.enabled && this.transport.browserAvailable
  }

  async execute(portal: PortalTarget, limit: number, ctx: StrategyContext): Promise<RawRecord[]> {
    const url = this.config.url ?? portal.searchUrl
    const waitAfterLoadMs = this.config.waitAfterLoadMs ?? this.defaultWaitAfterLoadMs
    const nextSelector = this.config.nextSelector

    return this.transport.automate(
      url,
      { strategyName: this.name, portal: portal.name, signal: ctx.signal },
      async ({ page, navigate, signal }) => {
        const records: RawRecord[] = []
        const seen = new Set<string>()

        for (let pageNumber = 1; pageNumber <= this.config.maxPages; pageNumber++) {
          if (waitAfterLoadMs > 0) {
            await page.waitForTimeout(waitAfterLoadMs)
          }

          const extracted = recordsFromHtml(
            await page.content(),
            this.selectors,
            { strategy: this.name, baseUrl: page.url(), extractedAt: new Date() },
            limit
          )
          for (const record of extracted) {
            if (seen.has(record.externalId)) continue
            seen.add(record.externalId)
            records.push(record)
          }

          ctx.logger.debug('Automation page extracted', { pageNumber, total: records.length })

          if (
            pageNumber >= this.config.maxPages ||
            records.length >= limit ||
            !nextSelector ||
            !(await page.isVisible(nextSelector))
          ) {
            break
          }

          throwIfCancelled(signal)
          await navigate(() => page.click(nextSelector, { timeoutMs: CLICK_TIMEOUT_MS }))
        }

        return records.slice(0, limit)
      }
    )
  }
}
