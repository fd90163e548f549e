/**
 * Configuration loader
 *
 * Reads the JSON configuration file (BIDWATCH_CONFIG, or config/default.json
 * beside the harvester), validates it against the zod schema and applies
 * environment overrides. Fails fast with a ConfigError on anything invalid.
 */

import { readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z, type ZodIssue } from 'zod'
import { loggers } from './logger.js'
import { harvesterConfigSchema, type HarvesterConfig } from './schema.js'

const log = loggers.config

export const DEFAULT_CONFIG_PATH = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', 'config', 'default.json')

export const DEFAULT_PORT = 3040

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'ConfigError'
  }
}

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const envSchema = z.object({
  BIDWATCH_CONFIG: z.string().min(1).optional(),
  BIDWATCH_USER_AGENT: z.string().min(1).optional(),
  BIDWATCH_REQUEST_DELAY_SECONDS: z.coerce.number().nonnegative().optional(),
  BIDWATCH_RESPECT_ROBOTS_TXT: flag.optional(),
  BIDWATCH_BROWSER_ENABLED: flag.optional(),
  BIDWATCH_MAX_RETRIES: z.coerce.number().int().nonnegative().optional(),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
})

export type EnvOverrides = z.infer<typeof envSchema>

export interface LoadedConfig {
  config: HarvesterConfig
  /** Port for the status server */
  port: number
  /** File the configuration was read from */
  source: string
}

export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
}

/**
 * Validate an already-parsed configuration object.
 */
export function parseConfig(input: unknown, source = 'inline'): HarvesterConfig {
  const parsed = harvesterConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration in ${source}`, formatIssues(parsed.error.issues))
  }
  return parsed.data
}

export function parseEnv(env: NodeJS.ProcessEnv): EnvOverrides {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError('Invalid environment', formatIssues(parsed.error.issues))
  }
  return parsed.data
}

export function applyEnvOverrides(config: HarvesterConfig, env: EnvOverrides): HarvesterConfig {
  return {
    ...config,
    scraping: {
      ...config.scraping,
      userAgent: env.BIDWATCH_USER_AGENT ?? config.scraping.userAgent,
      requestDelaySeconds: env.BIDWATCH_REQUEST_DELAY_SECONDS ?? config.scraping.requestDelaySeconds,
      respectRobotsTxt: env.BIDWATCH_RESPECT_ROBOTS_TXT ?? config.scraping.respectRobotsTxt,
      maxRetries: env.BIDWATCH_MAX_RETRIES ?? config.scraping.maxRetries,
    },
    browser: {
      ...config.browser,
      enabled: env.BIDWATCH_BROWSER_ENABLED ?? config.browser.enabled,
    },
  }
}

function readJson(path: string): unknown {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined
    if (code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${path}`)
    }
    throw new ConfigError(`Cannot read configuration file ${path}: ${error instanceof Error ? error.message : String(error)}`)
  }

  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`)
  }
}

/**
 * Load, validate and override. `path` wins over BIDWATCH_CONFIG.
 *
 * @throws ConfigError
 */
export function loadConfig(options: { path?: string; env?: NodeJS.ProcessEnv } = {}): LoadedConfig {
  const env = parseEnv(options.env ?? process.env)
  const source = resolve(options.path ?? env.BIDWATCH_CONFIG ?? DEFAULT_CONFIG_PATH)

  const config = applyEnvOverrides(parseConfig(readJson(source), source), env)

  if (!config.scraping.respectRobotsTxt) {
    log.warn('robots.txt compliance is DISABLED by configuration', { source })
  }
  log.info('Configuration loaded', {
    source,
    portals: config.portals.map((portal) => portal.name),
    browserEnabled: config.browser.enabled,
  })

  return { config, port: env.PORT, source }
}
