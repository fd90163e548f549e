import { createLogger } from '@bidwatch/logger'
import type { ILogger } from '@bidwatch/logger'

export const logger = createLogger('harvester')

/**
 * Component loggers. Each module takes the one matching its layer so log
 * lines carry a stable `component` field.
 */
export const loggers = {
  config: logger.child('config'),
  politeness: logger.child('politeness'),
  transport: logger.child('transport'),
  browser: logger.child('browser'),
  chain: logger.child('chain'),
  portal: logger.child('portal'),
  orchestrator: logger.child('orchestrator'),
  audit: logger.child('audit'),
  server: logger.child('server'),
  cli: logger.child('cli'),
} satisfies Record<string, ILogger>

export type { ILogger }
