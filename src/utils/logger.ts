/**
 * @fileoverview Logging utility with level prefixes and timing support.
 * Console lines read `[info] message key=value`, coloured when stdout is a
 * terminal. Optionally mirrors every line, with timestamp and context, to a
 * file under logs/ when WRITE_LOG_TO_FILE is set.
 */

import * as fs from 'fs'
import * as path from 'path'

// ============================================================================
// Types
// ============================================================================

/** Log level for categorizing messages */
export type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug' | 'timing'

/** Printed tag for each level; success and timing fold into info and debug */
const LEVEL_TAGS: Record<LogLevel, 'info' | 'warn' | 'error' | 'debug'> = {
  info: 'info',
  success: 'info',
  warn: 'warn',
  error: 'error',
  debug: 'debug',
  timing: 'debug',
}

/** Severity order used by the LOG_LEVEL threshold */
const TAG_SEVERITY = { debug: 0, info: 1, warn: 2, error: 3 } as const

/** Timer storage for tracking operation durations */
const timers: Map<string, number> = new Map()

// ============================================================================
// File Logging Setup
// ============================================================================

/** Log file write stream, opened on the first line when enabled */
let logFileStream: fs.WriteStream | null = null

/** Set once the WRITE_LOG_TO_FILE decision has been made */
let fileLoggingChecked = false

/**
 * Initialize file logging if enabled.
 */
function initFileLogging(): void {
  if (fileLoggingChecked) return
  fileLoggingChecked = true
  if (process.env.WRITE_LOG_TO_FILE !== 'true') return

  const logsDir = path.resolve(process.cwd(), 'logs')
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true })
  }

  const now = new Date()
  const timestamp = now.toISOString()
    .replace(/[:.]/g, '-')
    .replace('T', '_')
    .slice(0, 19)
  const logFilePath = path.join(logsDir, `payprobe_${timestamp}.log`)

  logFileStream = fs.createWriteStream(logFilePath, { flags: 'a' })
  logFileStream.write(`=== payprobe log - started ${now.toISOString()} ===\n`)
}

/**
 * Remove ANSI colour sequences from a line.
 */
export function stripAnsi(line: string): string {
  // eslint-disable-next-line no-control-regex
  return line.replace(/\x1b\[[0-9;]*m/g, '')
}

/**
 * Write a line to the log file (without ANSI colors).
 */
function writeToLogFile(line: string): void {
  initFileLogging()
  if (!logFileStream) return
  logFileStream.write(stripAnsi(line) + '\n')
}

// ============================================================================
// ANSI Colors
// ============================================================================

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  gray: '\x1b[90m',
}

/**
 * Colour is used only on an interactive terminal without NO_COLOR.
 */
function colorEnabled(): boolean {
  return process.stdout.isTTY === true && !process.env.NO_COLOR
}

function paint(color: string, text: string): string {
  return colorEnabled() ? `${color}${text}${colors.reset}` : text
}

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Get current timestamp in HH:MM:SS.mmm format.
 */
function getTimestamp(): string {
  const now = new Date()
  const hours = now.getHours().toString().padStart(2, '0')
  const minutes = now.getMinutes().toString().padStart(2, '0')
  const seconds = now.getSeconds().toString().padStart(2, '0')
  const ms = now.getMilliseconds().toString().padStart(3, '0')
  return `${hours}:${minutes}:${seconds}.${ms}`
}

/**
 * Format duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`
  }
  const minutes = Math.floor(ms / 60000)
  const seconds = ((ms % 60000) / 1000).toFixed(1)
  return `${minutes}m ${seconds}s`
}

function getLevelColor(level: LogLevel): string {
  switch (level) {
    case 'info': return colors.cyan
    case 'success': return colors.green
    case 'warn': return colors.yellow
    case 'error': return colors.red
    case 'debug': return colors.gray
    case 'timing': return colors.magenta
  }
}

/**
 * Minimum printed severity, from LOG_LEVEL (default: everything).
 */
function getThreshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase()
  switch (configured) {
    case 'info':
    case 'warn':
    case 'error':
      return TAG_SEVERITY[configured]
    default:
      return TAG_SEVERITY.debug
  }
}

/**
 * Format a value for display.
 */
function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return paint(colors.dim, 'null')
  }
  if (typeof value === 'number') {
    return paint(colors.yellow, String(value))
  }
  if (typeof value === 'boolean') {
    return paint(value ? colors.green : colors.red, String(value))
  }
  if (typeof value === 'string') {
    return paint(colors.green, `"${value}"`)
  }
  if (Array.isArray(value)) {
    return paint(colors.cyan, `[${value.length} items]`)
  }
  if (typeof value === 'object') {
    return paint(colors.cyan, `{${Object.keys(value).length} keys}`)
  }
  return String(value)
}

// ============================================================================
// Core Logger
// ============================================================================

/**
 * Logger class for prefixed console output.
 */
export class Logger {
  private context: string

  constructor(context: string = 'payprobe') {
    this.context = context
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const tag = LEVEL_TAGS[level]
    if (TAG_SEVERITY[tag] < getThreshold()) return

    let body = message
    if (data && Object.keys(data).length > 0) {
      const dataStr = Object.entries(data)
        .map(([k, v]) => `${paint(colors.dim, `${k}=`)}${formatValue(v)}`)
        .join(' ')
      body = `${message} ${dataStr}`
    }

    console.log(`${paint(getLevelColor(level), `[${tag}]`)} ${body}`)
    writeToLogFile(`${getTimestamp()} [${tag}] [${this.context}] ${body}`)
  }

  /** Log info message */
  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data)
  }

  /** Log success message */
  success(message: string, data?: Record<string, unknown>): void {
    this.log('success', message, data)
  }

  /** Log warning message */
  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data)
  }

  /** Log error message */
  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data)
  }

  /** Log debug message */
  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data)
  }

  /**
   * Start a timer for an operation.
   * @param label - Unique label for the timer
   */
  startTimer(label: string): void {
    timers.set(`${this.context}:${label}`, Date.now())
  }

  /**
   * End a timer and log the duration.
   * @param label - The timer label (must match startTimer)
   * @param message - Optional completion message
   * @returns Duration in milliseconds
   */
  endTimer(label: string, message?: string): number {
    const key = `${this.context}:${label}`
    const start = timers.get(key)

    if (start === undefined) {
      this.warn(`Timer "${label}" was not started`)
      return 0
    }

    const duration = Date.now() - start
    timers.delete(key)

    const displayMessage = message || `Completed: ${label}`
    this.log('timing', `${displayMessage} took ${paint(colors.magenta, formatDuration(duration))}`)

    return duration
  }
}

// ============================================================================
// Exports
// ============================================================================

/** Main logger instance */
export const logger = new Logger('payprobe')

/** Create a logger for a specific module */
export function createLogger(context: string): Logger {
  return new Logger(context)
}
