import * as path from 'path'
import { beforeEach, describe, it, expect, vi } from 'vitest'
import { loadConfig } from './config.js'
import { createProgram, USAGE } from './program.js'
import type { MonitorConfig } from './types.js'

describe('createProgram', () => {
  let runs: { target: string; config: MonitorConfig }[]
  let exitCodes: number[]
  let stdout: string[]

  beforeEach(() => {
    runs = []
    exitCodes = []
    stdout = []
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      stdout.push(line)
    })
  })

  function program(exitCode = 0) {
    return createProgram({
      env: {},
      run: async (target, config) => {
        runs.push({ target, config })
        return exitCode
      },
      setExitCode: (code) => exitCodes.push(code),
    })
  }

  it('prints usage and exits 1 without a target', async () => {
    await program().parseAsync(['node', 'payprobe'])

    expect(stdout).toEqual([USAGE])
    expect(exitCodes).toEqual([1])
    expect(runs).toEqual([])
  })

  it('treats a blank target as missing', async () => {
    await program().parseAsync(['node', 'payprobe', '   '])

    expect(stdout).toEqual([USAGE])
    expect(exitCodes).toEqual([1])
  })

  it('runs the monitor with the environment configuration', async () => {
    await program().parseAsync(['node', 'payprobe', 'abc'])

    expect(runs).toEqual([{ target: 'abc', config: loadConfig({}) }])
    expect(exitCodes).toEqual([0])
  })

  it('applies --har-dir and --timeout over the environment', async () => {
    await program().parseAsync(['node', 'payprobe', 'https://www.givesendgo.com/abc', '--har-dir', 'captures', '--timeout', '5000'])

    expect(runs).toHaveLength(1)
    expect(runs[0].target).toBe('https://www.givesendgo.com/abc')
    expect(runs[0].config.harDir).toBe(path.resolve('captures'))
    expect(runs[0].config.navigationTimeoutMs).toBe(5000)
  })

  it('passes the run exit code through', async () => {
    await program(1).parseAsync(['node', 'payprobe', 'abc'])

    expect(exitCodes).toEqual([1])
  })

  it('rejects a timeout that is not a positive integer', async () => {
    const errors: string[] = []
    const command = program()
      .exitOverride()
      .configureOutput({ writeErr: (text) => errors.push(text) })

    await expect(command.parseAsync(['node', 'payprobe', 'abc', '--timeout', 'soon'])).rejects.toThrow(
      'Expected a positive number of milliseconds.'
    )
    expect(runs).toEqual([])
    expect(errors).toHaveLength(1)
  })
})
