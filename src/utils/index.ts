/**
 * @fileoverview Barrel export for utility modules.
 *
 * @example
 * import { extractSlug, isPaymentUrl, createLogger } from '../utils/index.js'
 */

export * from './url.js'
export * from './errors.js'
export * from './domain.js'
export * from './payment-report.js'
export * from './logger.js'
