/**
 * @fileoverview Type definitions for the payment-processor pattern data.
 * These types define the structure of data loaded from JSON files.
 */

/**
 * Raw payment pattern as stored in JSON (pattern is a string).
 */
export interface PaymentPatternRaw {
  /** Regular expression pattern string (without delimiters) */
  pattern: string
  /** Processor or keyword the pattern stands for */
  description: string
}

/**
 * Compiled payment pattern with RegExp ready for matching.
 */
export interface PaymentPattern {
  /** Case-insensitive expression matched anywhere in a URL */
  pattern: RegExp
  /** Processor or keyword the pattern stands for */
  description: string
}
