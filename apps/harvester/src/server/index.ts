// Load environment variables first, before any other imports
import '../env.js'

import { loggers } from '../config/logger.js'
import { loadConfig, type LoadedConfig } from '../config/settings.js'
import { toUserMessage } from '../scraper/errors.js'
import { AcquisitionOrchestrator } from '../scraper/orchestrator.js'
import { InMemoryOpportunityStore } from '../scraper/store.js'
import { installGlobalErrorHandlers } from '../utils/error-handlers.js'
import { createApp } from './app.js'

const log = loggers.server

installGlobalErrorHandlers()

function loadOrExit(): LoadedConfig {
  try {
    return loadConfig()
  } catch (error) {
    log.fatal('Invalid configuration, server will not start', { reason: toUserMessage(error) })
    process.exit(2)
  }
}

const loaded = loadOrExit()

const store = new InMemoryOpportunityStore()
const orchestrator = AcquisitionOrchestrator.fromConfig(loaded.config, { store })
const app = createApp(orchestrator, { store })

const server = app.listen(loaded.port, () => {
  log.info('Status server listening', { port: loaded.port, portals: orchestrator.registry.list() })
})

let isShuttingDown = false

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) return
  isShuttingDown = true

  const shutdownStart = Date.now()
  log.info('Shutting down', { signal })

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()))
    })
    await orchestrator.close()
    log.info('Graceful shutdown complete', { durationMs: Date.now() - shutdownStart })
    process.exit(0)
  } catch (error) {
    log.error('Error during shutdown', {}, error)
    process.exit(1)
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))
