import { describe, it, expect, afterEach } from 'vitest'
import { configureLogger, createLogger, resetLoggerConfiguration } from '../index.js'
import type { LogEntry } from '../index.js'

function captureEntries(): LogEntry[] {
  const entries: LogEntry[] = []
  configureLogger({ format: 'json', level: 'debug', sink: (entry) => entries.push(entry) })
  return entries
}

describe('logger', () => {
  afterEach(() => {
    resetLoggerConfiguration()
  })

  it('builds component paths for nested children', () => {
    const entries = captureEntries()

    createLogger('harvester').child('orchestrator').child('esbd').info('Run started')

    expect(entries).toHaveLength(1)
    expect(entries[0].service).toBe('harvester')
    expect(entries[0].component).toBe('orchestrator:esbd')
    expect(entries[0].message).toBe('Run started')
  })

  it('merges default context with per-call metadata', () => {
    const entries = captureEntries()

    const log = createLogger('harvester').child('transport', { portal: 'esbd' })
    log.warn('Retrying', { attempt: 2 })

    expect(entries[0].portal).toBe('esbd')
    expect(entries[0].attempt).toBe(2)
    expect(entries[0].level).toBe('warn')
  })

  it('drops entries below the configured level', () => {
    const entries: LogEntry[] = []
    configureLogger({ level: 'warn', sink: (entry) => entries.push(entry) })

    const log = createLogger('harvester')
    log.debug('hidden')
    log.info('hidden')
    log.error('visible')

    expect(entries.map((e) => e.message)).toEqual(['visible'])
  })

  it('serialises errors without throwing on non-Error values', () => {
    const entries = captureEntries()

    const log = createLogger('harvester')
    log.error('Boom', {}, new Error('bad thing'))
    log.error('Odd', {}, 'plain string')

    expect(entries[0].error?.name).toBe('Error')
    expect(entries[0].error?.message).toBe('bad thing')
    expect(entries[1].error).toEqual({ name: 'UnknownError', message: 'plain string' })
  })

  it('formats JSON lines when the json format is selected', () => {
    const lines: string[] = []
    configureLogger({ format: 'json', level: 'info', sink: (_entry, formatted) => lines.push(formatted) })

    createLogger('harvester').info('hello', { portal: 'esbd' })

    const parsed: unknown = JSON.parse(lines[0])
    expect(parsed).toMatchObject({ level: 'info', service: 'harvester', message: 'hello', portal: 'esbd' })
  })
})
