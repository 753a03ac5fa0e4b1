/**
 * @fileoverview Type definitions shared across the capture pipeline.
 * Contains the run configuration, the capture session result, and the
 * shapes the report is built from.
 */

// ============================================================================
// Configuration Types
// ============================================================================

/** Which registrable-domain resolver to use */
export type ResolverPreference = 'psl' | 'naive'

/**
 * Explicit settings for one monitoring run.
 * Built by loadConfig from the environment and CLI options.
 */
export interface MonitorConfig {
  /** Directory the HAR file is written to (created if missing) */
  harDir: string
  /** Campaign site root; the slug is appended as the single path segment */
  campaignBaseUrl: string
  /** User agent presented by the browser context */
  userAgent: string
  /** Browser viewport */
  viewport: { width: number; height: number }
  /** Upper bound on the initial page load */
  navigationTimeoutMs: number
  /** How often the wait loop checks the stop signal */
  pollIntervalMs: number
  /** Command-line fragments identifying stray browser processes */
  reaperPatterns: string[]
  /** Requested domain resolver; psl falls back to naive when tldts is unavailable */
  domainResolver: ResolverPreference
}

// ============================================================================
// Capture Types
// ============================================================================

/**
 * Which producer ended the session.
 * - page-closed: the operator closed the tab or window
 * - browser-disconnected: the browser went away (OS close, crash, kill)
 * - interrupted: SIGINT while waiting
 * - navigation-failed: the first page load failed, so there was nothing to wait for
 */
export type StopReason = 'page-closed' | 'browser-disconnected' | 'interrupted' | 'navigation-failed'

/**
 * Outcome of a capture session after teardown.
 */
export interface CaptureResult {
  /** Campaign slug the session opened */
  slug: string
  /** Where the HAR was requested to be written */
  harPath: string
  /** Whether the HAR file exists on disk after teardown */
  harWritten: boolean
  /** Size of the HAR file in bytes (0 when missing) */
  harBytes: number
  /** Payment URLs seen by the live request listener, in arrival order */
  matchedUrls: string[]
  /** Producer that ended the session */
  stopReason: StopReason
  /** Message of the navigation failure, if any */
  navigationError: string | null
}

// ============================================================================
// Report Types
// ============================================================================

/**
 * Number of unique matched URLs on one registrable domain.
 */
export interface DomainCount {
  domain: string
  count: number
}

/**
 * Deduplicated view of every matched URL.
 */
export interface PaymentReport {
  /** Unique http(s) URLs, sorted lexicographically */
  uniqueUrls: string[]
  /** Descending by count, ties in discovery order */
  domainCounts: DomainCount[]
}
