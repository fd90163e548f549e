import { describe, it, expect } from 'vitest'
import {
  ConfigError,
  DEFAULT_PORT,
  applyEnvOverrides,
  loadConfig,
  parseConfig,
  parseEnv,
} from '../settings.js'

const minimalPortal = {
  name: 'city',
  baseUrl: 'https://bids.example.gov',
  strategies: [{ type: 'static-html' }],
}

describe('parseConfig', () => {
  it('fills defaults', () => {
    const config = parseConfig({ portals: [minimalPortal] })

    expect(config.scraping).toMatchObject({
      requestDelaySeconds: 3,
      offPeakHours: { start: '23:00', end: '06:00' },
      timeoutMs: 30000,
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      respectRobotsTxt: true,
    })
    expect(config.browser).toMatchObject({ enabled: false, poolSize: 2 })
    expect(config.portals[0]).toMatchObject({ enabled: true, priority: 100, selectors: { list: '.solicitation-item' } })
    expect(config.portals[0].strategies[0]).toMatchObject({ type: 'static-html', enabled: true })
  })

  it('lists every invalid path', () => {
    const error = (() => {
      try {
        parseConfig({
          scraping: { offPeakHours: { start: '25:00', end: '06:00' } },
          portals: [{ ...minimalPortal, baseUrl: 'not a url' }],
        })
      } catch (e) {
        return e
      }
      return null
    })()

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toHaveProperty('issues', [
      'scraping.offPeakHours.start: expected HH:MM',
      'portals.0.baseUrl: Invalid url',
    ])
  })

  it('rejects duplicate portal names', () => {
    expect(() => parseConfig({ portals: [minimalPortal, minimalPortal] })).toThrow(
      "portals.1.name: duplicate portal name 'city'"
    )
  })

  it('rejects an unknown strategy type', () => {
    expect(() => parseConfig({ portals: [{ ...minimalPortal, strategies: [{ type: 'selenium' }] }] })).toThrow(
      ConfigError
    )
  })
})

describe('environment overrides', () => {
  it('parses flags and numbers', () => {
    const env = parseEnv({
      BIDWATCH_USER_AGENT: 'CustomBot/2.0',
      BIDWATCH_REQUEST_DELAY_SECONDS: '5',
      BIDWATCH_RESPECT_ROBOTS_TXT: 'false',
      BIDWATCH_BROWSER_ENABLED: '1',
      BIDWATCH_MAX_RETRIES: '0',
      PORT: '8080',
    })

    const config = applyEnvOverrides(parseConfig({ portals: [minimalPortal] }), env)

    expect(config.scraping).toMatchObject({
      userAgent: 'CustomBot/2.0',
      requestDelaySeconds: 5,
      respectRobotsTxt: false,
      maxRetries: 0,
    })
    expect(config.browser.enabled).toBe(true)
    expect(env.PORT).toBe(8080)
  })

  it('leaves the file values alone when unset', () => {
    const base = parseConfig({ scraping: { requestDelaySeconds: 7 }, portals: [minimalPortal] })

    const config = applyEnvOverrides(base, parseEnv({}))

    expect(config).toEqual(base)
  })

  it('rejects a malformed flag', () => {
    expect(() => parseEnv({ BIDWATCH_RESPECT_ROBOTS_TXT: 'maybe' })).toThrow(/^Invalid environment: BIDWATCH_RESPECT_ROBOTS_TXT: /)
  })
})

describe('loadConfig', () => {
  it('loads the bundled default configuration', () => {
    const { config, port } = loadConfig({ env: {} })

    expect(config.portals.map((portal) => portal.name)).toEqual(['esbd', 'houston_beaconbid', 'san_antonio'])
    expect(config.portals[1].strategies.map((strategy) => strategy.type)).toEqual([
      'graphql',
      'export',
      'static-html',
      'browser-automation',
    ])
    expect(port).toBe(DEFAULT_PORT)
  })

  it('fails fast on a missing file', () => {
    expect(() => loadConfig({ path: '/nonexistent/bidwatch.json', env: {} })).toThrow(
      'Configuration file not found: /nonexistent/bidwatch.json'
    )
  })
})
