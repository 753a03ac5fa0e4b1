/**
 * @fileoverview Barrel export for data modules.
 *
 * Pattern data lives in data/payment-patterns.json so the list can be
 * edited without code changes.
 */

export type { PaymentPattern, PaymentPatternRaw } from './types.js'

export {
  compilePaymentPatterns,
  getPaymentPatterns,
  loadPaymentPatternsFrom,
} from './loader.js'
