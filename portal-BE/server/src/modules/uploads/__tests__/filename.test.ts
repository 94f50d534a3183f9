import { describe, expect, it } from 'vitest'
import { sanitizeFilename } from '../filename'

describe('sanitizeFilename', () => {
  it('strips path traversal down to a single segment', () => {
    expect(sanitizeFilename('../../etc/passwd')).toBe('etc_passwd')
    expect(sanitizeFilename('..\\..\\windows\\win.ini')).toBe('windows_win.ini')
  })

  it('keeps ordinary names intact', () => {
    expect(sanitizeFilename('resume-2025_final.pdf')).toBe('resume-2025_final.pdf')
  })

  it('joins whitespace with underscores and drops unsafe characters', () => {
    expect(sanitizeFilename('my  cv (1).pdf')).toBe('my_cv_1.pdf')
    expect(sanitizeFilename('a;b|c$.docx')).toBe('abc.docx')
  })

  it('folds accented letters to ASCII and drops other scripts', () => {
    expect(sanitizeFilename('résumé.pdf')).toBe('resume.pdf')
    expect(sanitizeFilename('履歴書.pdf')).toBe('pdf')
  })

  it('removes leading and trailing dots and underscores', () => {
    expect(sanitizeFilename('.hidden')).toBe('hidden')
    expect(sanitizeFilename('__cv.pdf__')).toBe('cv.pdf')
  })

  it('guards Windows device names', () => {
    expect(sanitizeFilename('con.txt')).toBe('_con.txt')
    expect(sanitizeFilename('LPT1')).toBe('_LPT1')
    expect(sanitizeFilename('console.txt')).toBe('console.txt')
  })

  it('returns an empty string when nothing usable is left', () => {
    expect(sanitizeFilename('../..')).toBe('')
    expect(sanitizeFilename('')).toBe('')
  })
})
