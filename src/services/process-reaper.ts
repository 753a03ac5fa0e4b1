/**
 * @fileoverview Best-effort cleanup of browser processes left behind by
 * earlier runs.
 *
 * Playwright's Chromium can outlive its window (common under WSL). Before
 * launching and after teardown every process whose command line matches
 * one of the reaper patterns is sent SIGKILL. Nothing here ever fails the run.
 */

import { execFile } from 'child_process'
import { promisify } from 'util'
import { createLogger, getErrorMessage, isMissingCommandError } from '../utils/index.js'

const log = createLogger('Reaper')

const execFileAsync = promisify(execFile)

/**
 * Runs an external command and resolves with its stdout.
 * Rejects on a non-zero exit or when the command cannot be spawned.
 */
export interface CommandRunner {
  run(command: string, args: string[]): Promise<string>
}

/** Sends SIGKILL to a process */
export type ProcessKiller = (pid: number) => void

export interface ReaperOptions {
  runner?: CommandRunner
  kill?: ProcessKiller
  /** PID never to kill (defaults to this process) */
  selfPid?: number
}

/** CommandRunner backed by child_process.execFile */
export const execFileRunner: CommandRunner = {
  async run(command: string, args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(command, args)
    return stdout
  },
}

const sigkill: ProcessKiller = (pid) => {
  process.kill(pid, 'SIGKILL')
}

/**
 * Parse `ps -eo pid,args` output into pid/command pairs, skipping the header.
 */
export function parseProcessList(output: string): { pid: number; command: string }[] {
  const processes: { pid: number; command: string }[] = []
  for (const line of output.split('\n')) {
    const match = /^\s*(\d+)\s+(.*)$/.exec(line)
    if (match) {
      processes.push({ pid: Number(match[1]), command: match[2] })
    }
  }
  return processes
}

/**
 * Fallback for systems without pkill (BusyBox, stripped containers).
 */
async function killFromProcessList(
  pattern: string,
  runner: CommandRunner,
  kill: ProcessKiller,
  selfPid: number
): Promise<void> {
  let output: string
  try {
    output = await runner.run('ps', ['-eo', 'pid,args'])
  } catch (error) {
    log.debug(`Could not list processes: ${getErrorMessage(error)}`)
    return
  }

  let matcher: RegExp
  try {
    matcher = new RegExp(pattern)
  } catch (error) {
    log.debug(`Skipping invalid reaper pattern ${pattern}: ${getErrorMessage(error)}`)
    return
  }

  for (const { pid, command } of parseProcessList(output)) {
    if (pid === selfPid || !matcher.test(command)) continue
    try {
      kill(pid)
      log.debug('Killed stale browser process', { pid })
    } catch (error) {
      // Already gone, or not ours to kill
      log.debug(`Could not kill ${pid}: ${getErrorMessage(error)}`)
    }
  }
}

/**
 * Kill leftover browser processes matching any of the patterns.
 *
 * @param patterns - Regular expressions matched against full command lines
 */
export async function killStaleBrowsers(
  patterns: readonly string[],
  options: ReaperOptions = {}
): Promise<void> {
  const runner = options.runner ?? execFileRunner
  const kill = options.kill ?? sigkill
  const selfPid = options.selfPid ?? process.pid

  for (const pattern of patterns) {
    try {
      await runner.run('pkill', ['-9', '-f', pattern])
      log.debug('Killed stale browser processes', { pattern })
    } catch (error) {
      if (isMissingCommandError(error)) {
        await killFromProcessList(pattern, runner, kill, selfPid)
      } else {
        // pkill exits 1 when nothing matched
        log.debug(`pkill found nothing to kill for ${pattern}: ${getErrorMessage(error)}`)
      }
    }
  }
}
