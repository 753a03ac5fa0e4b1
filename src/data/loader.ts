/**
 * @fileoverview Data loader for the payment-processor pattern list.
 * Loads the JSON file from the repository's data/ directory and compiles
 * each entry into a case-insensitive RegExp.
 *
 * The list mixes specific vendor hosts (stripe.com, adyen.com, ...) with
 * the generic keywords "payment", "checkout" and "card". The keywords
 * over-match on purpose; narrowing them is a product decision.
 */

import { readFileSync } from 'fs'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import type { PaymentPattern, PaymentPatternRaw } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

/** Shared by src/data and dist/data, both two levels below the root */
const DATA_DIR = join(__dirname, '..', '..', 'data')

// ============================================================================
// JSON File Loading
// ============================================================================

function isPaymentPatternRaw(value: unknown): value is PaymentPatternRaw {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pattern' in value &&
    typeof value.pattern === 'string' &&
    'description' in value &&
    typeof value.description === 'string'
  )
}

/**
 * Read a pattern file and check its shape.
 * @throws Error if the file is not an array of pattern entries
 */
function loadRawPatterns(fullPath: string): PaymentPatternRaw[] {
  const parsed: unknown = JSON.parse(readFileSync(fullPath, 'utf-8'))
  if (!Array.isArray(parsed) || !parsed.every(isPaymentPatternRaw)) {
    throw new Error(`Pattern file ${fullPath} must be an array of { pattern, description } entries`)
  }
  return parsed
}

// ============================================================================
// Pattern Compilation
// ============================================================================

/**
 * Compile raw entries into RegExp patterns.
 */
export function compilePaymentPatterns(raw: readonly PaymentPatternRaw[]): PaymentPattern[] {
  return raw.map(entry => ({
    pattern: new RegExp(entry.pattern, 'i'),
    description: entry.description,
  }))
}

/**
 * Load and compile a pattern file from an explicit path.
 */
export function loadPaymentPatternsFrom(fullPath: string): PaymentPattern[] {
  return compilePaymentPatterns(loadRawPatterns(fullPath))
}

/** Payment patterns database - loaded once on first use */
let _paymentPatterns: PaymentPattern[] | null = null

/**
 * Get the bundled payment patterns (lazy loaded and cached).
 */
export function getPaymentPatterns(): PaymentPattern[] {
  if (!_paymentPatterns) {
    _paymentPatterns = loadPaymentPatternsFrom(join(DATA_DIR, 'payment-patterns.json'))
  }
  return _paymentPatterns
}
