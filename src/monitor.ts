/**
 * @fileoverview One complete monitoring run: capture, HAR post-scan, report.
 */

import type { MonitorConfig } from './types.js'
import { CaptureSession, scanHar, type CaptureSessionDeps } from './services/index.js'
import {
  buildPaymentReport,
  createLogger,
  extractSlug,
  renderPaymentReport,
  selectDomainResolver,
  type DomainResolver,
} from './utils/index.js'

const log = createLogger('Monitor')

export interface MonitorDeps extends CaptureSessionDeps {
  /** Resolver to use instead of selecting one from the config */
  resolver?: DomainResolver
  /** Receives each report line (default: console.log) */
  print?: (line: string) => void
}

/**
 * Record a campaign visit and print the payment processors it reached.
 *
 * @param target - Campaign slug or full campaign URL
 * @returns Process exit code: 0 when the HAR exists, 1 otherwise
 */
export async function runMonitor(
  target: string,
  config: MonitorConfig,
  deps: MonitorDeps = {}
): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line))
  const slug = extractSlug(target)
  const resolver = deps.resolver ?? await selectDomainResolver(config.domainResolver)

  const session = new CaptureSession(config, deps)
  log.startTimer('capture')
  const capture = await session.run(slug)
  log.endTimer('capture', `Capture ended (${capture.stopReason})`)

  const matchedUrls = [...capture.matchedUrls]
  if (capture.harWritten) {
    matchedUrls.push(...await scanHar(capture.harPath, deps.patterns))
  }

  const report = buildPaymentReport(matchedUrls, resolver)
  for (const line of renderPaymentReport(report)) {
    print(line)
  }

  return capture.harWritten ? 0 : 1
}
