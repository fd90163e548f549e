/**
 * Acquisition Error Taxonomy
 *
 * Every failure inside the acquisition layer is mapped onto one of these
 * kinds. The kind decides the operational response:
 *
 * | kind                | retried by transport | effect on the chain        |
 * |---------------------|----------------------|----------------------------|
 * | robots_disallowed   | no                   | strategy skips the URL     |
 * | transient_network   | yes (with backoff)   | strategy failed when spent |
 * | permanent_request   | no                   | strategy failed            |
 * | parse               | no                   | falls through              |
 * | automation          | no                   | falls through              |
 * | orchestration       | -                    | run fails                  |
 * | cancelled           | no                   | run ends as cancelled      |
 */

import { ZodError } from 'zod'

export type AcquisitionErrorKind =
  | 'robots_disallowed'
  | 'transient_network'
  | 'permanent_request'
  | 'parse'
  | 'automation'
  | 'orchestration'
  | 'cancelled'

export interface AcquisitionErrorOptions {
  url?: string
  statusCode?: number
  cause?: unknown
}

export class AcquisitionError extends Error {
  readonly kind: AcquisitionErrorKind
  readonly retryable: boolean
  readonly url?: string
  readonly statusCode?: number

  constructor(
    kind: AcquisitionErrorKind,
    message: string,
    retryable: boolean,
    options: AcquisitionErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = new.target.name
    this.kind = kind
    this.retryable = retryable
    this.url = options.url
    this.statusCode = options.statusCode
  }
}

export class RobotsDisallowedError extends AcquisitionError {
  constructor(url: string) {
    super('robots_disallowed', `URL disallowed by robots.txt: ${url}`, false, { url })
  }
}

export class TransientNetworkError extends AcquisitionError {
  constructor(message: string, options: AcquisitionErrorOptions = {}) {
    super('transient_network', message, true, options)
  }
}

export class PermanentRequestError extends AcquisitionError {
  constructor(message: string, options: AcquisitionErrorOptions = {}) {
    super('permanent_request', message, false, options)
  }
}

export class ParseError extends AcquisitionError {
  constructor(message: string, options: AcquisitionErrorOptions = {}) {
    super('parse', message, false, options)
  }
}

export class AutomationError extends AcquisitionError {
  constructor(message: string, options: AcquisitionErrorOptions = {}) {
    super('automation', message, false, options)
  }
}

export class OrchestrationError extends AcquisitionError {
  constructor(message: string, options: AcquisitionErrorOptions = {}) {
    super('orchestration', message, false, options)
  }
}

export class CancelledError extends AcquisitionError {
  constructor(message = 'Operation cancelled') {
    super('cancelled', message, false)
  }
}

/** Node network error codes that indicate a dropped or unreachable connection. */
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
])

/**
 * Map an HTTP status code to an error kind.
 * Returns null for statuses that are not failures.
 */
export function classifyHttpStatus(status: number): 'transient_network' | 'permanent_request' | null {
  if (status === 429 || status >= 500) return 'transient_network'
  if (status >= 400) return 'permanent_request'
  return null
}

export function errorForStatus(status: number, url: string, statusText = ''): AcquisitionError | null {
  const kind = classifyHttpStatus(status)
  const message = `HTTP ${status}${statusText ? `: ${statusText}` : ''}`
  if (kind === 'transient_network') {
    return new TransientNetworkError(message, { url, statusCode: status })
  }
  if (kind === 'permanent_request') {
    return new PermanentRequestError(message, { url, statusCode: status })
  }
  return null
}

function readErrorCode(error: Error): string | undefined {
  const direct = 'code' in error ? error.code : undefined
  if (typeof direct === 'string') return direct
  const cause = error.cause
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code
  }
  return undefined
}

/**
 * Classify any thrown value into the acquisition taxonomy.
 * Already-classified errors pass through unchanged.
 */
export function classifyError(error: unknown, url?: string): AcquisitionError {
  if (error instanceof AcquisitionError) {
    return error
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    return new ParseError(`Unexpected response shape: ${issues.join('; ')}`, { url, cause: error })
  }

  if (error instanceof SyntaxError) {
    return new ParseError(`Malformed response: ${error.message}`, { url, cause: error })
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new TransientNetworkError(`Request timed out: ${error.message}`, { url, cause: error })
    }

    const code = readErrorCode(error)
    if (code && TRANSIENT_ERROR_CODES.has(code)) {
      return new TransientNetworkError(`Network error (${code}): ${error.message}`, { url, cause: error })
    }

    // undici reports connection-level failures as "TypeError: fetch failed"
    if (error instanceof TypeError && error.message === 'fetch failed') {
      return new TransientNetworkError(`Network error: ${error.message}`, { url, cause: error })
    }

    if (error instanceof TypeError && /invalid url/i.test(error.message)) {
      return new PermanentRequestError(`Malformed URL: ${url ?? error.message}`, { url, cause: error })
    }

    return new PermanentRequestError(error.message || 'Unexpected request failure', { url, cause: error })
  }

  return new PermanentRequestError(String(error), { url })
}

export function isCancellation(error: unknown): boolean {
  return error instanceof CancelledError
}

/**
 * Message shown to operators. Stack traces stay in the logs.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof CancelledError) {
    return 'Run cancelled'
  }
  if (error instanceof Error) {
    return error.message || error.name
  }
  return String(error)
}
