/**
 * @fileoverview Headed browser session that records a campaign visit to HAR.
 *
 * The session launches Chromium, opens the campaign page, and waits for the
 * operator to finish. Three things end the wait: the page closing, the
 * browser disconnecting, or SIGINT. Whichever comes first sets the stop
 * signal, and teardown then runs exactly once to flush the HAR before the
 * browser goes away.
 */

import { mkdir, stat } from 'fs/promises'
import { chromium, type BrowserContextOptions, type LaunchOptions } from 'playwright'
import type { PaymentPattern } from '../data/index.js'
import type { CaptureResult, MonitorConfig } from '../types.js'
import {
  buildCampaignUrl,
  buildHarPath,
  createLogger,
  getErrorMessage,
  isPaymentUrl,
} from '../utils/index.js'
import { killStaleBrowsers } from './process-reaper.js'
import { StopSignal } from './stop-signal.js'

const log = createLogger('Session')

// ============================================================================
// Browser Port
// ============================================================================
// The slice of Playwright the session drives. Playwright's own chromium
// satisfies it; tests supply an in-process fake.

export interface CapturedRequest {
  url(): string
}

export interface CapturePage {
  on(event: 'request', listener: (request: CapturedRequest) => void): unknown
  on(event: 'close', listener: () => void): unknown
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>
}

export interface CaptureContext {
  newPage(): Promise<CapturePage>
  close(): Promise<void>
}

export interface CaptureBrowser {
  on(event: 'disconnected', listener: () => void): unknown
  newContext(options: BrowserContextOptions): Promise<CaptureContext>
  close(): Promise<void>
}

export interface BrowserLauncher {
  launch(options: LaunchOptions): Promise<CaptureBrowser>
}

/**
 * Where operator interrupts arrive. `process` in production.
 */
export interface InterruptSource {
  on(event: 'SIGINT', listener: () => void): unknown
  removeListener(event: 'SIGINT', listener: () => void): unknown
}

/**
 * Collaborators of a session, each replaceable in tests.
 */
export interface CaptureSessionDeps {
  launcher?: BrowserLauncher
  interrupts?: InterruptSource
  /** Stray-process cleanup, run before launch and during teardown */
  reap?: (patterns: readonly string[]) => Promise<void>
  /** Patterns for the live request listener (default: bundled list) */
  patterns?: readonly PaymentPattern[]
}

// ============================================================================
// CaptureSession Class
// ============================================================================

/**
 * One browser, one context, one page and one HAR file. Single use.
 */
export class CaptureSession {
  private readonly config: MonitorConfig
  private readonly launcher: BrowserLauncher
  private readonly interrupts: InterruptSource
  private readonly reap: (patterns: readonly string[]) => Promise<void>
  private readonly patterns: readonly PaymentPattern[] | undefined

  private readonly stopSignal = new StopSignal()
  /** Payment URLs from the live listener, in arrival order */
  private readonly matchedUrls: string[] = []

  private browser: CaptureBrowser | null = null
  private context: CaptureContext | null = null
  /** Context close started by the page-close handler, awaited in teardown */
  private pendingContextClose: Promise<void> | null = null
  private started = false
  private tornDown = false

  constructor(config: MonitorConfig, deps: CaptureSessionDeps = {}) {
    this.config = config
    this.launcher = deps.launcher ?? chromium
    this.interrupts = deps.interrupts ?? process
    this.reap = deps.reap ?? ((patterns) => killStaleBrowsers(patterns))
    this.patterns = deps.patterns
  }

  /**
   * Record a visit to the campaign page until the operator is done.
   * Teardown always runs, also when launching the browser fails; that
   * failure is rethrown afterwards.
   *
   * @param slug - Campaign slug, already normalized
   */
  async run(slug: string): Promise<CaptureResult> {
    if (this.started) {
      throw new Error('CaptureSession can only run once')
    }
    this.started = true

    const harPath = buildHarPath(this.config.harDir, slug)
    await mkdir(this.config.harDir, { recursive: true })
    log.info(`HAR will be saved to: ${harPath}`)

    await this.reap(this.config.reaperPatterns)

    const onInterrupt = (): void => {
      if (this.stopSignal.trigger('interrupted')) {
        log.warn('CTRL-C detected – shutting down …')
      }
    }
    this.interrupts.on('SIGINT', onInterrupt)

    let navigationError: string | null = null
    try {
      const page = await this.open(harPath)
      navigationError = await this.navigate(page, buildCampaignUrl(this.config.campaignBaseUrl, slug))
      if (navigationError !== null) {
        this.stopSignal.trigger('navigation-failed')
      } else {
        log.info('Page loaded. Do whatever you need, then simply close the window.')
        log.info("Window is ready – close it when you're done … (Press CTRL-C to abort)")
        await this.stopSignal.wait(this.config.pollIntervalMs)
      }
    } finally {
      await this.teardown(onInterrupt)
    }

    return this.buildResult(slug, harPath, navigationError)
  }

  // ==========================================================================
  // Browser Lifecycle
  // ==========================================================================

  /**
   * Launch the headed browser and wire up the three stop triggers and the
   * live request listener.
   */
  private async open(harPath: string): Promise<CapturePage> {
    // Playwright must not kill the browser on CTRL-C before the HAR is flushed
    this.browser = await this.launcher.launch({
      headless: false,
      handleSIGINT: false,
      handleSIGTERM: false,
      handleSIGHUP: false,
    })

    this.browser.on('disconnected', () => {
      log.debug('Browser disconnected event.')
      this.stopSignal.trigger('browser-disconnected')
    })

    // Headers and timings only; bodies would make the HAR huge
    this.context = await this.browser.newContext({
      userAgent: this.config.userAgent,
      viewport: this.config.viewport,
      recordHar: { path: harPath, content: 'omit' },
    })

    const page = await this.context.newPage()

    page.on('request', (request) => {
      const url = request.url()
      if (isPaymentUrl(url, this.patterns)) {
        this.matchedUrls.push(url)
      }
    })

    page.on('close', () => {
      log.debug('Page closed – flushing HAR …')
      this.startContextClose()
      this.stopSignal.trigger('page-closed')
    })

    return page
  }

  /**
   * Load the campaign page, waiting for DOMContentLoaded only.
   * @returns Null on success, the failure message otherwise
   */
  private async navigate(page: CapturePage, url: string): Promise<string | null> {
    log.info(`Opening ${url} …`)
    try {
      await page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: this.config.navigationTimeoutMs,
      })
      return null
    } catch (error) {
      const message = getErrorMessage(error)
      log.error(`Couldn't load page: ${message}`)
      return message
    }
  }

  /**
   * Begin closing the context so Playwright writes the HAR right away.
   */
  private startContextClose(): void {
    if (this.context && !this.pendingContextClose && !this.tornDown) {
      this.pendingContextClose = this.closeContextQuietly(this.context)
    }
  }

  /**
   * Close the context, tolerating one that is already closed or whose
   * browser is gone.
   */
  private async closeContextQuietly(context: CaptureContext): Promise<void> {
    await context.close().catch((error: unknown) => {
      log.debug(`Context close failed: ${getErrorMessage(error)}`)
    })
  }

  // ==========================================================================
  // Teardown
  // ==========================================================================

  /**
   * Flush the HAR, close the browser and reap stragglers. Runs once; a
   * second CTRL-C during it is ignored.
   *
   * @param onInterrupt - The session's SIGINT listener, removed here
   */
  private async teardown(onInterrupt: () => void): Promise<void> {
    if (this.tornDown) return
    this.tornDown = true

    const ignoreInterrupt = (): void => {
      log.debug('CTRL-C ignored while cleaning up')
    }
    this.interrupts.on('SIGINT', ignoreInterrupt)
    this.interrupts.removeListener('SIGINT', onInterrupt)

    log.info('Flushing HAR and cleaning up …')
    try {
      if (this.context) {
        if (this.pendingContextClose) {
          await this.pendingContextClose
        }
        await this.closeContextQuietly(this.context)
      }

      if (this.browser) {
        await this.browser.close().catch((error: unknown) => {
          log.debug(`Browser close failed: ${getErrorMessage(error)}`)
        })
      }

      await this.reap(this.config.reaperPatterns)
    } finally {
      this.interrupts.removeListener('SIGINT', ignoreInterrupt)
      this.context = null
      this.browser = null
    }
  }

  private async buildResult(
    slug: string,
    harPath: string,
    navigationError: string | null
  ): Promise<CaptureResult> {
    const stats = await stat(harPath).catch(() => null)
    const harWritten = stats?.isFile() ?? false
    const harBytes = stats && harWritten ? stats.size : 0

    if (harWritten) {
      log.success(`HAR successfully written → ${harPath} (${harBytes} bytes)`)
    } else {
      log.error(`Expected HAR file '${harPath}' was NOT created!`)
    }

    return {
      slug,
      harPath,
      harWritten,
      harBytes,
      matchedUrls: [...this.matchedUrls],
      stopReason: this.stopSignal.reason ?? 'navigation-failed',
      navigationError,
    }
  }
}
