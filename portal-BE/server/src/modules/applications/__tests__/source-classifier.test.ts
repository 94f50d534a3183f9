import { describe, expect, it } from 'vitest'
import { classifySource } from '../source-classifier'
import { BROWSER_AGENT } from '../../../../tests/helpers'

describe('classifySource', () => {
  it('flags python clients as bots', () => {
    expect(classifySource('python-requests/2.31')).toBe('bot')
    expect(classifySource('Python-urllib/3.11')).toBe('bot')
  })

  it('flags any agent mentioning requests', () => {
    expect(classifySource('my-crawler (uses Requests)')).toBe('bot')
  })

  it('treats browsers and missing agents as direct', () => {
    expect(classifySource(BROWSER_AGENT)).toBe('direct')
    expect(classifySource('curl/8.4.0')).toBe('direct')
    expect(classifySource(undefined)).toBe('direct')
    expect(classifySource('')).toBe('direct')
  })
})
