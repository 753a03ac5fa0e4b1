import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { stripAnsi } from '../utils/index.js'
import { matchHarEntry, scanHar } from './har-scanner.js'
import { getPaymentPatterns } from '../data/index.js'

function harEntry(
  url: string,
  requestHeaders: unknown[] = [],
  responseHeaders: unknown[] = []
): Record<string, unknown> {
  return {
    startedDateTime: '2026-01-01T00:00:00.000Z',
    time: 12,
    request: { method: 'GET', url, httpVersion: 'HTTP/2.0', headers: requestHeaders },
    response: { status: 200, statusText: 'OK', headers: responseHeaders },
    timings: { send: 0, wait: 10, receive: 2 },
  }
}

describe('matchHarEntry', () => {
  const patterns = getPaymentPatterns()

  it('matches the request URL', () => {
    expect(matchHarEntry(harEntry('https://js.stripe.com/v3'), patterns)).toEqual(['https://js.stripe.com/v3'])
  })

  it('recovers payment URLs from request and response header values', () => {
    const entry = harEntry(
      'https://www.givesendgo.com/api/donate',
      [{ name: 'Referer', value: 'https://www.paypal.com/checkoutnow?token=test-token' }],
      [
        { name: 'Location', value: 'https://checkout.adyen.com/hpp/pay.shtml' },
        { name: 'Content-Security-Policy', value: "script-src 'self' https://js.stripe.com https://cdn.example.com" },
      ]
    )

    expect(matchHarEntry(entry, patterns)).toEqual([
      'https://www.paypal.com/checkoutnow?token=test-token',
      'https://checkout.adyen.com/hpp/pay.shtml',
      'https://js.stripe.com',
    ])
  })

  it('skips malformed headers and entries', () => {
    const entry = harEntry('https://example.com/', ['oops', { name: 'X' }, { name: 'Y', value: 42 }])
    expect(matchHarEntry(entry, patterns)).toEqual([])
    expect(matchHarEntry('not an entry', patterns)).toEqual([])
    expect(matchHarEntry({ request: null }, patterns)).toEqual([])
  })
})

describe('scanHar', () => {
  let dir: string
  let lines: string[]

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'payprobe-har-'))
    lines = []
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      lines.push(stripAnsi(line))
    })
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  function writeHar(content: unknown): string {
    const file = join(dir, 'capture.har')
    writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content))
    return file
  }

  it('collects matches across all entries in file order', async () => {
    const file = writeHar({
      log: {
        version: '1.2',
        entries: [
          harEntry('https://www.givesendgo.com/abc'),
          harEntry('https://js.stripe.com/v3'),
          harEntry('https://js.stripe.com/v3'),
          harEntry('https://www.givesendgo.com/api/x', [], [
            { name: 'Link', value: '<https://m.stripe.network/inner.html>; rel=preload' },
          ]),
        ],
      },
    })

    await expect(scanHar(file)).resolves.toEqual([
      'https://js.stripe.com/v3',
      'https://js.stripe.com/v3',
      'https://m.stripe.network/inner.html>',
    ])
  })

  it('recovers a redirect target that was never requested directly', async () => {
    const file = writeHar({
      log: {
        entries: [
          harEntry('https://www.givesendgo.com/go', [], [
            { name: 'location', value: 'https://www.paypal.com/donate?hosted_button_id=TEST' },
          ]),
        ],
      },
    })

    await expect(scanHar(file)).resolves.toEqual(['https://www.paypal.com/donate?hosted_button_id=TEST'])
  })

  it('treats missing log or entries as empty', async () => {
    await expect(scanHar(writeHar({}))).resolves.toEqual([])
    await expect(scanHar(writeHar({ log: {} }))).resolves.toEqual([])
    expect(lines.filter((l) => l.startsWith('[warn]'))).toEqual([])
  })

  it('warns and returns nothing for malformed JSON', async () => {
    const file = writeHar('{"log": {"entries": [')

    await expect(scanHar(file)).resolves.toEqual([])
    expect(lines.filter((l) => l.startsWith('[warn]'))).toHaveLength(1)
    expect(lines.find((l) => l.startsWith('[warn]'))).toMatch(/^\[warn\] Could not parse HAR for extra matches: /)
  })

  it('warns when the root is not an object', async () => {
    await expect(scanHar(writeHar([1, 2]))).resolves.toEqual([])
    expect(lines).toContain('[warn] Could not parse HAR for extra matches: HAR root is not a JSON object')
  })

  it('warns when the file does not exist', async () => {
    await expect(scanHar(join(dir, 'missing.har'))).resolves.toEqual([])
    expect(lines.filter((l) => l.startsWith('[warn]'))).toHaveLength(1)
  })
})
