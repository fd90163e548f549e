/**
 * Strategy factory
 *
 * A portal's chain is plain data: the configured strategy entries, each
 * turned into one AcquisitionStrategy and ordered by priority. Without an
 * explicit priority, configuration order decides.
 */

import type { PortalConfig, StrategyConfig } from '../../config/schema.js'
import type { Transport } from '../fetch/transport.js'
import type { AcquisitionStrategy, PortalTarget } from '../types.js'
import { BrowserAutomationStrategy } from './browser-automation.js'
import { ExportEndpointStrategy } from './export-endpoint.js'
import { GraphqlStrategy } from './graphql.js'
import { RenderedDomStrategy } from './rendered-dom.js'
import { StaticHtmlStrategy } from './static-html.js'

export interface StrategyDeps {
  transport: Transport
  /** Browser-wide settle time used when a strategy sets none */
  waitAfterLoadMs?: number
}

export function createStrategy(
  config: StrategyConfig,
  portal: PortalConfig,
  deps: StrategyDeps,
  defaultPriority: number
): AcquisitionStrategy {
  const waitAfterLoadMs = deps.waitAfterLoadMs ?? 0

  switch (config.type) {
    case 'graphql':
      return new GraphqlStrategy(config, deps.transport, portal.fieldMappings, defaultPriority)
    case 'export':
      return new ExportEndpointStrategy(config, deps.transport, portal.fieldMappings, defaultPriority)
    case 'static-html':
      return new StaticHtmlStrategy(config, deps.transport, portal.selectors, defaultPriority)
    case 'rendered-dom':
      return new RenderedDomStrategy(config, deps.transport, portal.selectors, waitAfterLoadMs, defaultPriority)
    case 'browser-automation':
      return new BrowserAutomationStrategy(config, deps.transport, portal.selectors, waitAfterLoadMs, defaultPriority)
  }
}

export function createStrategies(portal: PortalConfig, deps: StrategyDeps): AcquisitionStrategy[] {
  return sortByPriority(portal.strategies.map((config, index) => createStrategy(config, portal, deps, (index + 1) * 10)))
}

/**
 * Stable sort, lowest priority first.
 */
export function sortByPriority(strategies: AcquisitionStrategy[]): AcquisitionStrategy[] {
  return strategies
    .map((strategy, index) => ({ strategy, index }))
    .sort((a, b) => a.strategy.priority - b.strategy.priority || a.index - b.index)
    .map(({ strategy }) => strategy)
}

export function toPortalTarget(portal: PortalConfig): PortalTarget {
  return {
    name: portal.name,
    baseUrl: portal.baseUrl,
    searchUrl: portal.searchUrl ?? portal.baseUrl,
  }
}

export { BrowserAutomationStrategy, ExportEndpointStrategy, GraphqlStrategy, RenderedDomStrategy, StaticHtmlStrategy }
