import { describe, expect, it } from 'vitest'
import { buildRedirectUrl, extractPreservedParams, isPreservedKey } from '../param-preserver'

describe('isPreservedKey', () => {
  it('accepts gclid and utm_ prefixed keys only', () => {
    expect(isPreservedKey('gclid')).toBe(true)
    expect(isPreservedKey('utm_source')).toBe(true)
    expect(isPreservedKey('utm_')).toBe(true)
    expect(isPreservedKey('UTM_source')).toBe(false)
    expect(isPreservedKey('gclid_extra')).toBe(false)
    expect(isPreservedKey('fbclid')).toBe(false)
  })
})

describe('extractPreservedParams', () => {
  it('keeps only tracking parameters in order of first appearance', () => {
    const search = new URLSearchParams('page=2&utm_medium=cpc&gclid=abc123&ref=home&utm_source=google')

    const preserved = extractPreservedParams(search)

    expect(Object.keys(preserved)).toEqual(['utm_medium', 'gclid', 'utm_source'])
    expect(preserved).toEqual({ utm_medium: 'cpc', gclid: 'abc123', utm_source: 'google' })
  })

  it('keeps the first value of a repeated key', () => {
    const preserved = extractPreservedParams(new URLSearchParams('utm_source=google&utm_source=bing'))
    expect(preserved).toEqual({ utm_source: 'google' })
  })

  it('returns values unchanged after decoding', () => {
    const preserved = extractPreservedParams(new URLSearchParams('utm_campaign=spring+sale%2F2025'))
    expect(preserved.utm_campaign).toBe('spring sale/2025')
  })

  it('returns an empty map when nothing qualifies', () => {
    expect(extractPreservedParams(new URLSearchParams('a=1&b=2'))).toEqual({})
  })
})

describe('buildRedirectUrl', () => {
  it('returns the base path when there is nothing to carry', () => {
    expect(buildRedirectUrl('/', {})).toBe('/')
  })

  it('appends preserved parameters', () => {
    expect(buildRedirectUrl('https://apply.example.com/submit', { utm_source: 'google', gclid: 'abc123' })).toBe(
      'https://apply.example.com/submit?utm_source=google&gclid=abc123'
    )
  })

  it('lets extra parameters override preserved ones in place', () => {
    const url = buildRedirectUrl('/', { utm_source: 'google', gclid: 'abc123' }, { utm_source: 'newsletter', step: '2' })
    expect(url).toBe('/?utm_source=newsletter&gclid=abc123&step=2')
  })

  it('form-encodes values', () => {
    expect(buildRedirectUrl('/privacy', { utm_campaign: 'spring sale/2025' })).toBe(
      '/privacy?utm_campaign=spring+sale%2F2025'
    )
  })
})
