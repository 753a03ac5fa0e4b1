import { describe, it, expect } from 'vitest'
import { compilePaymentPatterns } from '../data/index.js'
import {
  createPslResolver,
  isPaymentUrl,
  naiveResolver,
  registrableDomain,
  selectDomainResolver,
  type DomainResolver,
} from './domain.js'

describe('isPaymentUrl', () => {
  it('matches payment processor hosts', () => {
    expect(isPaymentUrl('https://api.stripe.com/v1/tokens')).toBe(true)
    expect(isPaymentUrl('https://www.paypal.com/checkoutnow')).toBe(true)
    expect(isPaymentUrl('https://checkout.adyen.com/v71/payments')).toBe(true)
    expect(isPaymentUrl('https://x.klarnacdn.net/lib.js')).toBe(true)
  })

  it('ignores case', () => {
    expect(isPaymentUrl('https://JS.STRIPE.COM/v3')).toBe(true)
  })

  it('matches the broad keywords anywhere in the URL', () => {
    expect(isPaymentUrl('https://www.givesendgo.com/api/donation/payment-intent')).toBe(true)
    expect(isPaymentUrl('https://cdn.example.com/img/giftcard.png')).toBe(true)
  })

  it('rejects unrelated URLs', () => {
    expect(isPaymentUrl('https://example.com/about')).toBe(false)
    expect(isPaymentUrl('https://fonts.googleapis.com/css2?family=Inter')).toBe(false)
  })

  it('uses the pattern list it is given', () => {
    const patterns = compilePaymentPatterns([{ pattern: 'example\\.com', description: 'Test' }])
    expect(isPaymentUrl('https://example.com/about', patterns)).toBe(true)
    expect(isPaymentUrl('https://api.stripe.com/v1/tokens', patterns)).toBe(false)
  })
})

describe('registrableDomain', () => {
  it('reduces hosts to their registrable domain with the naive resolver', () => {
    expect(registrableDomain('js.stripe.com')).toBe('stripe.com')
    expect(registrableDomain('www.paypal.com')).toBe('paypal.com')
    expect(registrableDomain('checkout.adyen.com')).toBe('adyen.com')
  })

  it('normalizes case, a trailing dot and one leading www label', () => {
    expect(registrableDomain('WWW.Stripe.COM.')).toBe('stripe.com')
  })

  it('returns single-label and empty hosts unchanged', () => {
    expect(registrableDomain('localhost')).toBe('localhost')
    expect(registrableDomain('')).toBe('')
  })

  it('returns the host as given when the resolver throws', () => {
    const broken: DomainResolver = {
      name: 'psl',
      resolve() {
        throw new Error('bad host')
      },
    }
    expect(registrableDomain('Weird..Host', broken)).toBe('Weird..Host')
  })

  it('uses the Public Suffix List for multi-label suffixes', async () => {
    const resolver = await selectDomainResolver('psl')
    expect(resolver.name).toBe('psl')
    expect(registrableDomain('js.stripe.com', resolver)).toBe('stripe.com')
    expect(registrableDomain('www.paypal.com', resolver)).toBe('paypal.com')
    expect(registrableDomain('checkout.adyen.com', resolver)).toBe('adyen.com')
    expect(registrableDomain('pay.shop.example.co.uk', resolver)).toBe('example.co.uk')
    expect(registrableDomain('pay.shop.example.co.uk', naiveResolver)).toBe('co.uk')
  })
})

describe('createPslResolver', () => {
  it('falls back to the last two labels when the list has no answer', () => {
    const resolver = createPslResolver(() => null)
    expect(resolver.resolve('a.b.c.test')).toBe('c.test')
  })
})

describe('selectDomainResolver', () => {
  it('returns the naive resolver when asked for it', async () => {
    let loaded = false
    const resolver = await selectDomainResolver('naive', async () => {
      loaded = true
      return { getDomain: () => null }
    })
    expect(resolver).toBe(naiveResolver)
    expect(loaded).toBe(false)
  })

  it('falls back to the naive resolver when tldts cannot be loaded', async () => {
    const resolver = await selectDomainResolver('psl', () => Promise.reject(new Error('Cannot find module')))
    expect(resolver).toBe(naiveResolver)
  })
})
