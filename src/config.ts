/**
 * @fileoverview Run configuration from environment variables.
 * dotenv populates process.env from .env before this is read (see cli.ts).
 */

import * as path from 'path'
import type { MonitorConfig, ResolverPreference } from './types.js'
import { createLogger } from './utils/index.js'

const log = createLogger('Config')

/** Desktop Chrome on Windows 10 */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) ' +
  'AppleWebKit/537.36 (KHTML, like Gecko) ' +
  'Chrome/125.0.0.0 Safari/537.36'

/**
 * Command-line fragments of browsers Playwright leaves behind: the
 * remote-debugging pipe flag it always passes, and its bundled Chromium path.
 */
export const DEFAULT_REAPER_PATTERNS = [
  'chrome.*--remote-debugging-pipe',
  'playwright.*chromium',
]

export const DEFAULT_CAMPAIGN_BASE_URL = 'https://www.givesendgo.com'
export const DEFAULT_NAVIGATION_TIMEOUT_MS = 60_000
export const DEFAULT_POLL_INTERVAL_MS = 200

/**
 * Read a positive integer variable, falling back to the default on junk.
 */
function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }
  const value = Number(raw)
  if (!Number.isInteger(value) || value <= 0) {
    log.warn(`Ignoring ${name}=${raw}: expected a positive integer, using ${fallback}`)
    return fallback
  }
  return value
}

function readResolverPreference(env: NodeJS.ProcessEnv): ResolverPreference {
  const raw = env.DOMAIN_RESOLVER?.trim().toLowerCase()
  if (!raw || raw === 'psl') {
    return 'psl'
  }
  if (raw === 'naive') {
    return 'naive'
  }
  log.warn(`Ignoring DOMAIN_RESOLVER=${raw}: expected psl or naive`)
  return 'psl'
}

/**
 * Build the configuration for a run.
 *
 * @param env - Environment to read (process.env in production)
 * @param overrides - Values from CLI options, which win over the environment
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<MonitorConfig> = {}
): MonitorConfig {
  const config: MonitorConfig = {
    harDir: path.resolve(env.HAR_DIR || 'har'),
    campaignBaseUrl: env.CAMPAIGN_BASE_URL || DEFAULT_CAMPAIGN_BASE_URL,
    userAgent: env.BROWSER_USER_AGENT || DEFAULT_USER_AGENT,
    viewport: { width: 1920, height: 1080 },
    navigationTimeoutMs: readPositiveInt(env, 'NAVIGATION_TIMEOUT_MS', DEFAULT_NAVIGATION_TIMEOUT_MS),
    pollIntervalMs: readPositiveInt(env, 'POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS),
    reaperPatterns: [...DEFAULT_REAPER_PATTERNS],
    domainResolver: readResolverPreference(env),
  }
  return { ...config, ...overrides }
}
