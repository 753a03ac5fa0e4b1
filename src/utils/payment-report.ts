/**
 * @fileoverview Builds the end-of-run payment processor summary.
 * Deduplicates matched URLs, tallies them by registrable domain and renders
 * the console sections.
 */

import type { DomainCount, PaymentReport } from '../types.js'
import { naiveResolver, registrableDomain, type DomainResolver } from './domain.js'
import { extractHostname, isHttpUrl } from './url.js'

/** Printed when nothing matched */
export const NO_MATCHES_NOTICE = 'No matching payment URLs captured. HAR saved for manual inspection.'

/**
 * Count unique URLs per registrable domain.
 * Map insertion order is discovery order, and the sort is stable, so equal
 * counts keep that order.
 */
function countDomains(uniqueUrls: string[], resolver: DomainResolver): DomainCount[] {
  const counts = new Map<string, number>()
  for (const url of uniqueUrls) {
    const host = extractHostname(url)
    if (!host) continue
    const domain = registrableDomain(host, resolver)
    counts.set(domain, (counts.get(domain) ?? 0) + 1)
  }
  return [...counts.entries()]
    .map(([domain, count]) => ({ domain, count }))
    .sort((a, b) => b.count - a.count)
}

/**
 * Build the report from every URL gathered during the run.
 *
 * @param matchedUrls - Live and post-scan matches, duplicates allowed
 * @param resolver - Registrable-domain resolver selected for the run
 */
export function buildPaymentReport(
  matchedUrls: readonly string[],
  resolver: DomainResolver = naiveResolver
): PaymentReport {
  const uniqueUrls = [...new Set(matchedUrls.filter(isHttpUrl))].sort()
  return {
    uniqueUrls,
    domainCounts: countDomains(uniqueUrls, resolver),
  }
}

/**
 * Console lines for a report, starting with a blank separator line.
 */
export function renderPaymentReport(report: PaymentReport): string[] {
  if (report.uniqueUrls.length === 0) {
    return ['', NO_MATCHES_NOTICE]
  }

  const lines = ['', '== Payment-processor domains detected ==']
  for (const { domain, count } of report.domainCounts) {
    lines.push(` • ${domain}  (${count} request${count === 1 ? '' : 's'})`)
  }
  lines.push('', '== Matching request URLs ==')
  for (const url of report.uniqueUrls) {
    lines.push(` • ${url}`)
  }
  return lines
}
