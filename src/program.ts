/**
 * @fileoverview Command-line definition.
 * Kept apart from cli.ts so it can be driven without touching process state.
 */

import * as path from 'path'
import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from './config.js'
import { runMonitor } from './monitor.js'
import type { MonitorConfig } from './types.js'

export const USAGE = 'Usage: payprobe <slug|url>'

interface CliOptions {
  harDir?: string
  timeout?: number
}

export interface ProgramDeps {
  run?: (target: string, config: MonitorConfig) => Promise<number>
  setExitCode?: (code: number) => void
  env?: NodeJS.ProcessEnv
}

function parseTimeout(value: string): number {
  const ms = Number(value)
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.')
  }
  return ms
}

/**
 * Build the payprobe command.
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const run = deps.run ?? runMonitor
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code })

  return new Command()
    .name('payprobe')
    .description('Open a GiveSendGo campaign in a visible browser, record the visit to HAR, and list the payment processors it contacted')
    .argument('[target]', 'campaign slug or full campaign URL')
    .option('--har-dir <dir>', 'directory for the HAR file (overrides HAR_DIR)')
    .option('--timeout <ms>', 'page load timeout in milliseconds', parseTimeout)
    .action(async (target: string | undefined, options: CliOptions) => {
      if (!target || !target.trim()) {
        console.log(USAGE)
        setExitCode(1)
        return
      }

      const overrides: Partial<MonitorConfig> = {}
      if (options.harDir) overrides.harDir = path.resolve(options.harDir)
      if (options.timeout) overrides.navigationTimeoutMs = options.timeout

      setExitCode(await run(target, loadConfig(deps.env ?? process.env, overrides)))
    })
}
