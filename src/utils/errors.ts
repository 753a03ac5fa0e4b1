/**
 * @fileoverview Error handling utilities for consistent error message extraction.
 */

/**
 * Safely extract an error message from an unknown error type.
 * Handles both Error instances and unknown thrown values.
 *
 * @param error - The caught error of unknown type
 * @returns The error message string, or 'Unknown error' for non-Error values
 *
 * @example
 * try {
 *   await page.goto(url)
 * } catch (error) {
 *   log.error(`Couldn't load page: ${getErrorMessage(error)}`)
 * }
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}

/**
 * Whether a child-process failure means the executable itself is missing.
 */
export function isMissingCommandError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}
