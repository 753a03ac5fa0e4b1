/**
 * @fileoverview Payment URL classification and registrable-domain resolution.
 *
 * Two resolvers implement DomainResolver: one backed by the Public Suffix
 * List through tldts, and one that keeps the last two DNS labels. The
 * choice is made once at startup by whether tldts can be loaded.
 */

import { getPaymentPatterns, type PaymentPattern } from '../data/index.js'
import type { ResolverPreference } from '../types.js'
import { getErrorMessage } from './errors.js'
import { createLogger } from './logger.js'

const log = createLogger('Domain')

// ============================================================================
// Payment URL Classification
// ============================================================================

/**
 * Whether a URL looks payment-related.
 * A URL matches when any pattern occurs anywhere in it, ignoring case.
 *
 * @example
 * isPaymentUrl('https://api.stripe.com/v1/tokens') // Returns true
 * isPaymentUrl('https://example.com/about') // Returns false
 */
export function isPaymentUrl(
  url: string,
  patterns: readonly PaymentPattern[] = getPaymentPatterns()
): boolean {
  return patterns.some(({ pattern }) => pattern.test(url))
}

// ============================================================================
// Domain Resolvers
// ============================================================================

/**
 * Reduces a normalized hostname to its registrable domain (eTLD+1).
 */
export interface DomainResolver {
  readonly name: ResolverPreference
  resolve(host: string): string
}

/** Signature of tldts' getDomain */
type GetDomain = (hostname: string) => string | null

/**
 * Keeps the last two dot-separated labels.
 * Wrong for multi-label suffixes such as co.uk, which is the price of
 * needing no dataset.
 */
export const naiveResolver: DomainResolver = {
  name: 'naive',
  resolve(host: string): string {
    const parts = host.split('.')
    return parts.length >= 2 ? parts.slice(-2).join('.') : host
  },
}

/**
 * Public Suffix List resolver. Hosts the list cannot place (IP addresses,
 * single labels) go through the naive rule.
 */
export function createPslResolver(getDomain: GetDomain): DomainResolver {
  return {
    name: 'psl',
    resolve(host: string): string {
      return getDomain(host) ?? naiveResolver.resolve(host)
    },
  }
}

/**
 * Pick the resolver for this run.
 *
 * @param preference - 'naive' skips the Public Suffix List entirely
 * @param loadTldts - Loader for the tldts module, replaceable in tests
 */
export async function selectDomainResolver(
  preference: ResolverPreference,
  loadTldts: () => Promise<{ getDomain: GetDomain }> = () => import('tldts')
): Promise<DomainResolver> {
  if (preference === 'naive') {
    return naiveResolver
  }
  try {
    const tldts = await loadTldts()
    return createPslResolver((hostname) => tldts.getDomain(hostname))
  } catch (error) {
    log.warn(`Public Suffix List unavailable, using last-two-labels domains: ${getErrorMessage(error)}`)
    return naiveResolver
  }
}

/**
 * Registrable domain of a host, e.g. 'stripe.com' for 'js.stripe.com'.
 * Lowercases and drops a leading 'www.' label first. Never throws: a host
 * the resolver rejects comes back as given.
 */
export function registrableDomain(host: string, resolver: DomainResolver = naiveResolver): string {
  const normalized = host.trim().toLowerCase().replace(/\.$/, '').replace(/^www\./, '')
  if (!normalized) {
    return host
  }
  try {
    return resolver.resolve(normalized) || host
  } catch (error) {
    log.debug(`Could not resolve domain for ${host}: ${getErrorMessage(error)}`)
    return host
  }
}
