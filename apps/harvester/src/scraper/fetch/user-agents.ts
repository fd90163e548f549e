/**
 * Rotates the User-Agent sent with each request.
 *
 * The declared crawl agent is always a member of the pool. robots.txt is
 * evaluated for the declared agent only, whichever string goes on the wire.
 * The shared index is a plain counter; rotation order under concurrency is
 * not deterministic.
 */

export const DEFAULT_BROWSER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0',
]

export class UserAgentRotator {
  readonly declared: string
  private readonly pool: readonly string[]
  private index = 0

  constructor(declared: string, pool: readonly string[] = DEFAULT_BROWSER_AGENTS) {
    this.declared = declared
    this.pool = [declared, ...pool.filter((agent) => agent !== declared)]
  }

  next(): string {
    const agent = this.pool[this.index % this.pool.length]
    this.index = (this.index + 1) % this.pool.length
    return agent
  }

  agents(): readonly string[] {
    return this.pool
  }
}
