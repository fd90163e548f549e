import type { AcquisitionOrchestrator } from '../scraper/orchestrator.js'
import type { ScrapingProgress, ScrapingResult } from '../scraper/types.js'

export const DEFAULT_LIMIT = 50

export interface CommandContext {
  orchestrator: AcquisitionOrchestrator
  print: (line: string) => void
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`
}

export function formatResult(result: ScrapingResult): string {
  if (result.cancelled) {
    return `${result.portal}: cancelled after ${seconds(result.durationMs)}`
  }
  if (!result.success) {
    return `${result.portal}: FAILED (${result.errorMessage ?? 'unknown error'})`
  }

  const stored = result.storedCount !== undefined ? `, ${result.storedCount} stored` : ''
  return `${result.portal}: ${result.recordCount} records in ${seconds(result.durationMs)}${stored}`
}

export function formatProgress(progress: ScrapingProgress): string {
  return `[${progress.portal}] ${progress.status} ${progress.percentComplete}% - ${progress.message}`
}

export function runPortalsCommand({ orchestrator, print }: CommandContext): number {
  const portals = orchestrator.listPortals()
  if (portals.length === 0) {
    print('No portals enabled')
    return 0
  }

  for (const portal of portals) {
    print(`${portal.name}  ${portal.displayName}  ${portal.baseUrl}`)
    print(`  strategies: ${portal.strategies.join(' -> ') || '(none)'}`)
  }
  return 0
}

export async function runRunCommand(
  { orchestrator, print }: CommandContext,
  input: { portal: string; limit?: number }
): Promise<number> {
  if (!input.portal) {
    print('Missing --portal <name>')
    return 2
  }

  const unsubscribe = orchestrator.onProgress((progress) => print(formatProgress(progress)))
  try {
    const result = await orchestrator.runPortal(input.portal, input.limit ?? DEFAULT_LIMIT)
    print(formatResult(result))
    for (const record of result.records.slice(0, 10)) {
      const due = record.dueAt ? ` (due ${record.dueAt.toISOString().slice(0, 10)})` : ''
      print(`  - ${record.externalId}: ${record.title}${due}`)
    }
    return result.success ? 0 : 1
  } finally {
    unsubscribe()
  }
}

export async function runRunAllCommand(
  { orchestrator, print }: CommandContext,
  input: { limit?: number }
): Promise<number> {
  const unsubscribe = orchestrator.onProgress((progress) => {
    if (progress.status !== 'running') print(formatProgress(progress))
  })

  try {
    const results = await orchestrator.runAll(input.limit ?? DEFAULT_LIMIT)
    for (const result of results) {
      print(formatResult(result))
    }

    const failed = results.filter((result) => !result.success).length
    const total = results.reduce((sum, result) => sum + result.recordCount, 0)
    print(`${results.length} portals, ${failed} failed, ${total} records`)
    return failed > 0 ? 1 : 0
  } finally {
    unsubscribe()
  }
}

export function runStatusCommand({ orchestrator, print }: CommandContext): number {
  const status = orchestrator.getStatus()

  print(`Portals: ${status.availablePortals.join(', ') || '(none)'}`)
  if (status.politeness) {
    const { offPeakHours, respectRobotsTxt, domainDelays } = status.politeness
    print(`robots.txt: ${respectRobotsTxt ? 'respected' : 'IGNORED'}`)
    print(`Off-peak window: ${offPeakHours.start}-${offPeakHours.end}`)
    for (const [domain, delay] of Object.entries(domainDelays)) {
      print(`  ${domain}: ${delay}s`)
    }
  }
  print(`Browser backend: ${status.browser ? `enabled (pool of ${status.browser.poolSize})` : 'disabled'}`)
  return 0
}
