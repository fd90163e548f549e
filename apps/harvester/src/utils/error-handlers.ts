/**
 * Process-level error handlers for the CLI and server entry points.
 */

import type { ILogger } from '@bidwatch/logger'
import { logger } from '../config/logger.js'

let installed = false

export function installGlobalErrorHandlers(log: ILogger = logger): void {
  if (installed) return
  installed = true

  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection', {}, reason)
  })

  process.on('uncaughtException', (error) => {
    log.fatal('Uncaught exception, exiting', {}, error)
    process.exit(1)
  })
}
