/**
 * @fileoverview Second detection pass over the saved HAR file.
 *
 * The live listener can miss traffic: responses served from cache, and
 * payment URLs that only ever appear inside a header (a Location redirect,
 * a Link preload, a CSP report-uri). This pass re-reads the HAR, re-checks
 * every request URL, and pulls absolute URLs out of every request and
 * response header value.
 */

import { readFile } from 'fs/promises'
import { getPaymentPatterns, type PaymentPattern } from '../data/index.js'
import {
  createLogger,
  extractEmbeddedUrls,
  getErrorMessage,
  isPaymentUrl,
} from '../utils/index.js'

const log = createLogger('HarScan')

// ============================================================================
// HAR Shape
// ============================================================================
// Only the fields the scan reads. Anything else in the file is ignored, and
// missing fields count as empty.

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function arrayAt(parent: unknown, key: string): unknown[] {
  if (!isObject(parent)) return []
  const value = parent[key]
  return Array.isArray(value) ? value : []
}

function objectAt(parent: JsonObject, key: string): JsonObject | null {
  const value = parent[key]
  return isObject(value) ? value : null
}

/**
 * Payment URLs embedded in a list of HAR headers ({ name, value } objects).
 */
function matchHeaderValues(headers: unknown[], patterns: readonly PaymentPattern[]): string[] {
  const found: string[] = []
  for (const header of headers) {
    if (!isObject(header) || typeof header.value !== 'string') continue
    for (const candidate of extractEmbeddedUrls(header.value)) {
      if (isPaymentUrl(candidate, patterns)) {
        found.push(candidate)
      }
    }
  }
  return found
}

/**
 * Payment URLs referenced by one HAR entry: its request URL, then anything
 * in request headers, then anything in response headers.
 */
export function matchHarEntry(entry: unknown, patterns: readonly PaymentPattern[]): string[] {
  if (!isObject(entry)) return []
  const found: string[] = []

  const request = objectAt(entry, 'request')
  const response = objectAt(entry, 'response')

  if (request && typeof request.url === 'string' && isPaymentUrl(request.url, patterns)) {
    found.push(request.url)
  }
  found.push(...matchHeaderValues(arrayAt(request, 'headers'), patterns))
  found.push(...matchHeaderValues(arrayAt(response, 'headers'), patterns))

  return found
}

/**
 * Scan a HAR file for payment URLs.
 * A file that cannot be read or parsed is reported as a warning and yields
 * no URLs; the run carries on with what the live listener saw.
 *
 * @param harPath - HAR written by the capture session
 * @returns Matches in file order, duplicates included
 */
export async function scanHar(
  harPath: string,
  patterns: readonly PaymentPattern[] = getPaymentPatterns()
): Promise<string[]> {
  try {
    const har: unknown = JSON.parse(await readFile(harPath, 'utf-8'))
    if (!isObject(har)) {
      throw new Error('HAR root is not a JSON object')
    }
    const entries = arrayAt(har.log, 'entries')
    const found = entries.flatMap((entry) => matchHarEntry(entry, patterns))
    log.debug('Scanned HAR', { entries: entries.length, matches: found.length })
    return found
  } catch (error) {
    log.warn(`Could not parse HAR for extra matches: ${getErrorMessage(error)}`)
    return []
  }
}
