/**
 * Browser Pool
 *
 * One shared headless browser, lazily launched, handing out at most
 * `poolSize` pages at a time. Callers check a page out with `withPage()`;
 * the page is closed and its slot released on every exit path.
 *
 * The browser is reached through a small `BrowserHandle` seam so tests can
 * inject fake pages. `launchChromium` is the playwright-core implementation.
 */

import { chromium } from 'playwright-core'
import type { Browser, Page } from 'playwright-core'
import type { ILogger } from '@bidwatch/logger'
import { loggers } from '../../config/logger.js'
import { AcquisitionError, AutomationError, CancelledError } from '../errors.js'
import { throwIfCancelled } from '../utils/sleep.js'

export interface NavigationResult {
  status: number
  url: string
}

/**
 * The page operations strategies and the transport rely on.
 */
export interface BrowserPage {
  goto(url: string, options: { timeoutMs: number }): Promise<NavigationResult | null>
  waitForSelector(selector: string, options: { timeoutMs: number }): Promise<void>
  waitForTimeout(ms: number): Promise<void>
  content(): Promise<string>
  isVisible(selector: string): Promise<boolean>
  click(selector: string, options: { timeoutMs: number }): Promise<void>
  url(): string
  close(): Promise<void>
}

export interface BrowserHandle {
  newPage(options: { userAgent: string }): Promise<BrowserPage>
  close(): Promise<void>
}

export type BrowserLauncher = () => Promise<BrowserHandle>

export interface BrowserPoolOptions {
  /** Maximum pages open at once (default: 2) */
  poolSize?: number
  launcher?: BrowserLauncher
  headless?: boolean
  logger?: ILogger
}

interface Waiter {
  resolve: () => void
  reject: (error: unknown) => void
  signal?: AbortSignal
  onAbort?: () => void
}

class PlaywrightPage implements BrowserPage {
  constructor(
    private readonly page: Page,
    private readonly closeContext: () => Promise<void>
  ) {}

  async goto(url: string, options: { timeoutMs: number }): Promise<NavigationResult | null> {
    const response = await this.page.goto(url, { timeout: options.timeoutMs, waitUntil: 'domcontentloaded' })
    return response ? { status: response.status(), url: response.url() } : null
  }

  async waitForSelector(selector: string, options: { timeoutMs: number }): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: options.timeoutMs })
  }

  async waitForTimeout(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms)
  }

  content(): Promise<string> {
    return this.page.content()
  }

  isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible()
  }

  async click(selector: string, options: { timeoutMs: number }): Promise<void> {
    await this.page.locator(selector).first().click({ timeout: options.timeoutMs })
  }

  url(): string {
    return this.page.url()
  }

  close(): Promise<void> {
    return this.closeContext()
  }
}

/**
 * Launch headless Chromium through playwright-core. Needs a Chromium the
 * machine already has (`PLAYWRIGHT_CHROMIUM_EXECUTABLE` or a Playwright
 * browser cache).
 */
export function launchChromium(options: { headless?: boolean } = {}): BrowserLauncher {
  return async () => {
    const browser: Browser = await chromium.launch({
      headless: options.headless ?? true,
      executablePath: process.env.PLAYWRIGHT_CHROMIUM_EXECUTABLE || undefined,
    })

    return {
      async newPage({ userAgent }) {
        // One context per checkout keeps cookies and agent isolated
        const context = await browser.newContext({ userAgent })
        const page = await context.newPage()
        return new PlaywrightPage(page, () => context.close())
      },
      close: () => browser.close(),
    }
  }
}

export class BrowserPool {
  readonly poolSize: number
  private readonly launcher: BrowserLauncher
  private readonly log: ILogger
  private browser: Promise<BrowserHandle> | null = null
  private inUse = 0
  private readonly waiters: Waiter[] = []
  private closed = false

  constructor(options: BrowserPoolOptions = {}) {
    this.poolSize = Math.max(1, options.poolSize ?? 2)
    this.launcher = options.launcher ?? launchChromium({ headless: options.headless })
    this.log = options.logger ?? loggers.browser
  }

  /**
   * Check out a page, run `fn`, and release the page whatever happens.
   * Browser failures surface as AutomationError.
   */
  async withPage<T>(
    fn: (page: BrowserPage) => Promise<T>,
    options: { userAgent: string; signal?: AbortSignal }
  ): Promise<T> {
    await this.acquireSlot(options.signal)

    let page: BrowserPage | null = null
    try {
      const browser = await this.getBrowser()
      page = await browser.newPage({ userAgent: options.userAgent })
      return await fn(page)
    } catch (error) {
      if (error instanceof AcquisitionError) throw error
      const message = error instanceof Error ? error.message : String(error)
      throw new AutomationError(`Browser failure: ${message}`, { cause: error })
    } finally {
      if (page) {
        await page.close().catch((error: unknown) => {
          this.log.warn('Failed to close browser page', {}, error)
        })
      }
      this.releaseSlot()
    }
  }

  stats(): { poolSize: number; inUse: number; waiting: number; launched: boolean } {
    return {
      poolSize: this.poolSize,
      inUse: this.inUse,
      waiting: this.waiters.length,
      launched: this.browser !== null,
    }
  }

  async close(): Promise<void> {
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      this.detach(waiter)
      waiter.reject(new AutomationError('Browser pool closed'))
    }

    const pending = this.browser
    this.browser = null
    if (pending) {
      const browser = await pending.catch(() => null)
      await browser?.close()
      this.log.info('Browser closed')
    }
  }

  private getBrowser(): Promise<BrowserHandle> {
    if (!this.browser) {
      this.log.info('Launching browser', { poolSize: this.poolSize })
      const launching = this.launcher()
      this.browser = launching
      // A failed launch is retried by the next checkout
      void launching.catch(() => {
        if (this.browser === launching) this.browser = null
      })
    }
    return this.browser
  }

  private acquireSlot(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal)
    if (this.closed) {
      return Promise.reject(new AutomationError('Browser pool closed'))
    }
    if (this.inUse < this.poolSize) {
      this.inUse++
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal }
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter)
          if (index !== -1) this.waiters.splice(index, 1)
          reject(new CancelledError())
        }
        signal.addEventListener('abort', waiter.onAbort, { once: true })
      }
      this.waiters.push(waiter)
    })
  }

  private releaseSlot(): void {
    const next = this.waiters.shift()
    if (next) {
      // Slot passes straight to the next waiter
      this.detach(next)
      next.resolve()
      return
    }
    this.inUse = Math.max(0, this.inUse - 1)
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort)
    }
  }
}
