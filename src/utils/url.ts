/**
 * @fileoverview URL helpers for campaign targets and captured traffic.
 * Normalizes operator input to a campaign slug, derives the page and HAR
 * locations from it, and pulls hosts and embedded URLs out of raw strings.
 */

import * as path from 'path'

/** Campaign path segment after the platform host */
const CAMPAIGN_SLUG_RE = /givesendgo\.com\/([^/?#]+)/i

/** Absolute URL embedded in free text such as a header value */
const EMBEDDED_URL_RE = /https?:\/\/[^\s'";,]+/gi

/**
 * Reduce a campaign URL to its slug.
 * Input without a campaign URL is taken to be a slug already and comes back
 * trimmed, so applying this twice gives the same result as once.
 *
 * @example
 * extractSlug('https://www.givesendgo.com/SaveTheFarm?utm=x') // Returns 'SaveTheFarm'
 * extractSlug('  SaveTheFarm ') // Returns 'SaveTheFarm'
 */
export function extractSlug(target: string): string {
  const match = CAMPAIGN_SLUG_RE.exec(target)
  return match ? match[1] : target.trim()
}

/**
 * Campaign page URL for a slug.
 */
export function buildCampaignUrl(baseUrl: string, slug: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${slug}`
}

/**
 * HAR output path for a slug.
 */
export function buildHarPath(harDir: string, slug: string): string {
  return path.join(harDir, `pmtproc_${slug}_monitor.har`)
}

/**
 * Extract the hostname from a URL string.
 *
 * @returns The hostname, or null when the URL does not parse or has no host
 */
export function extractHostname(url: string): string | null {
  try {
    const hostname = new URL(url).hostname
    return hostname || null
  } catch {
    return null
  }
}

/**
 * Whether a captured string is an absolute http(s) URL.
 */
export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value)
}

/**
 * All absolute http(s) URLs embedded in a piece of text, in order.
 *
 * @example
 * extractEmbeddedUrls('<https://a.test/x>; rel="preload"') // Returns ['https://a.test/x>']
 */
export function extractEmbeddedUrls(text: string): string[] {
  return text.match(EMBEDDED_URL_RE) ?? []
}
