#!/usr/bin/env node
import '../env.js'

import { loggers } from '../config/logger.js'
import { ConfigError, loadConfig } from '../config/settings.js'
import { toUserMessage } from '../scraper/errors.js'
import { AcquisitionOrchestrator } from '../scraper/orchestrator.js'
import { InMemoryOpportunityStore } from '../scraper/store.js'
import { installGlobalErrorHandlers } from '../utils/error-handlers.js'
import {
  runPortalsCommand,
  runRunAllCommand,
  runRunCommand,
  runStatusCommand,
  type CommandContext,
} from './commands.js'
import { asPositiveInt, asString, parseFlags } from './parse-flags.js'

const log = loggers.cli

function printHelp(): void {
  console.log('Bidwatch harvester')
  console.log('')
  console.log('Commands:')
  console.log('  portals                               List enabled portals and their strategy chains')
  console.log('  run --portal <name> [--limit 50]      Run one portal')
  console.log('  run-all [--limit 50]                  Run every enabled portal concurrently')
  console.log('  status                                Show politeness and backend settings')
  console.log('')
  console.log('Options:')
  console.log('  --config <path>                       Configuration file (default: BIDWATCH_CONFIG or config/default.json)')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    process.exit(0)
  }

  const limit = asPositiveInt(flags.limit)
  if (limit === null) {
    console.error('--limit must be a positive integer')
    process.exit(2)
  }

  installGlobalErrorHandlers()

  const { config } = loadConfig({ path: asString(flags.config) || undefined })
  const orchestrator = AcquisitionOrchestrator.fromConfig(config, { store: new InMemoryOpportunityStore() })
  const ctx: CommandContext = { orchestrator, print: (line) => console.log(line) }

  process.once('SIGINT', () => {
    log.warn('Interrupted, cancelling runs')
    orchestrator.cancel()
  })

  let exitCode = 2

  switch (command) {
    case 'portals':
      exitCode = runPortalsCommand(ctx)
      break
    case 'run':
      exitCode = await runRunCommand(ctx, { portal: asString(flags.portal), limit })
      break
    case 'run-all':
      exitCode = await runRunAllCommand(ctx, { limit })
      break
    case 'status':
      exitCode = runStatusCommand(ctx)
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  await orchestrator.close()
  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(toUserMessage(error))
  process.exit(error instanceof ConfigError ? 2 : 1)
})
