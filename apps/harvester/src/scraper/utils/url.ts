/**
 * URL helpers for politeness scoping and record hygiene.
 *
 * Pacing is scoped to the registrable domain (eTLD+1) so that
 * www.example.gov and bids.example.gov share one request budget.
 * robots.txt is scoped to the origin, which is how crawlers are expected
 * to look it up.
 */

import psl from 'psl'

/**
 * Validate that a URL parses and uses http or https.
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Extract the registrable domain (eTLD+1) from a URL.
 * Handles multi-part public suffixes such as .gov.uk and .com.au through the
 * Public Suffix List. Falls back to the hostname for IPs and localhost.
 *
 * @throws TypeError if the URL does not parse
 */
export function getRegistrableDomain(url: string): string {
  const hostname = new URL(url).hostname.toLowerCase()
  const parsed = psl.parse(hostname)

  if (parsed.error) {
    return hostname
  }

  return parsed.domain || hostname
}

/**
 * Origin used to locate robots.txt (scheme + host + port).
 */
export function getOrigin(url: string): string {
  return new URL(url).origin
}

/**
 * Path plus query, the part robots.txt rules are matched against.
 */
export function getRobotsPath(url: string): string {
  const parsed = new URL(url)
  return `${parsed.pathname}${parsed.search}`
}

/**
 * Resolve a possibly-relative link against a base URL.
 * Returns undefined for links that cannot be resolved or are not http(s)
 * (mailto:, javascript:, fragments only).
 */
export function resolveUrl(href: string | undefined, baseUrl: string): string | undefined {
  if (!href) return undefined
  const trimmed = href.trim()
  if (!trimmed || trimmed.startsWith('#')) return undefined

  try {
    const resolved = new URL(trimmed, baseUrl)
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      return undefined
    }
    resolved.hash = ''
    return resolved.toString()
  } catch {
    return undefined
  }
}

/**
 * Append query parameters to a URL, skipping undefined values.
 */
export function withQuery(url: string, params: Record<string, string | number | undefined>): string {
  const parsed = new URL(url)
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      parsed.searchParams.set(key, String(value))
    }
  }
  return parsed.toString()
}
