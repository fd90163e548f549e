/**
 * HTTP Fetcher
 *
 * One physical HTTP request through native fetch (or an injected
 * implementation). Retries, pacing and auditing belong to the Transport;
 * this class only turns a response into a body or a classified error.
 */

import { PermanentRequestError, errorForStatus } from '../errors.js'
import type { FetchLike } from '../politeness/robots.js'
import type { HttpMethod } from '../types.js'

export interface HttpRequest {
  method: HttpMethod
  headers: Record<string, string>
  body?: string
  signal: AbortSignal
}

export interface HttpResult {
  url: string
  status: number
  body: string
  contentType: string | null
}

export interface HttpFetcherOptions {
  /** Response size cap in bytes (default: 10 MB) */
  maxResponseBytes?: number
  fetchImpl?: FetchLike
}

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
}

const DEFAULT_MAX_RESPONSE_BYTES = 10 * 1024 * 1024

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
  'bot detection',
]

/**
 * Heuristic check for captcha / access-denied interstitials.
 */
export function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase()
  return BLOCK_INDICATORS.some((indicator) => lowerHtml.includes(indicator))
}

export class HttpFetcher {
  private readonly maxResponseBytes: number
  private readonly fetchImpl: FetchLike

  constructor(options: HttpFetcherOptions = {}) {
    this.maxResponseBytes = options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
  }

  /**
   * Single request, no retries.
   *
   * @throws TransientNetworkError for 429/5xx
   * @throws PermanentRequestError for other 4xx, blocked pages and oversized bodies
   */
  async fetchOnce(url: string, request: HttpRequest): Promise<HttpResult> {
    const response = await this.fetchImpl(url, {
      method: request.method,
      headers: { ...DEFAULT_FETCH_HEADERS, ...request.headers },
      body: request.body,
      signal: request.signal,
      redirect: 'follow',
    })

    // Blocked responses (403, 503 with captcha indicators) are not worth retrying
    if (response.status === 403 || response.status === 503) {
      const text = await response.text()
      if (looksLikeBlockedPage(text)) {
        throw new PermanentRequestError('Request blocked (captcha or access denied)', {
          url,
          statusCode: response.status,
        })
      }
    }

    const statusError = errorForStatus(response.status, url, response.statusText)
    if (statusError) {
      throw statusError
    }

    const contentLength = response.headers.get('content-length')
    if (contentLength && Number.parseInt(contentLength, 10) > this.maxResponseBytes) {
      throw new PermanentRequestError(`Response too large: ${contentLength} bytes`, {
        url,
        statusCode: response.status,
      })
    }

    const body = await this.readBodyWithLimit(response)
    if (body === null) {
      throw new PermanentRequestError('Response exceeded size limit', { url, statusCode: response.status })
    }

    return {
      url: response.url || url,
      status: response.status,
      body,
      contentType: response.headers.get('content-type'),
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > this.maxResponseBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      const decoder = new TextDecoder('utf-8')
      return decoder.decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}
