import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { describeDatabase, sqliteUriFile } from '../sqlite'

describe('sqliteUriFile', () => {
  it.each([
    ['file:data.db', 'data.db'],
    ['file:data.db?cache=shared', 'data.db'],
    ['file:///var/db/portal%20data.db', '/var/db/portal data.db'],
    ['file://localhost/var/db/data.db', '/var/db/data.db']
  ])('reads the file of %s', (uri, expected) => {
    expect(sqliteUriFile(uri)).toBe(expected)
  })

  it.each(['file::memory:', 'file::memory:?cache=shared', 'file:portal?mode=memory&cache=shared', 'file:'])(
    'treats %s as in-memory',
    (uri) => {
      expect(sqliteUriFile(uri)).toBeNull()
    }
  )
})

describe('describeDatabase', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portal-db-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('reports in-memory databases as present', () => {
    expect(describeDatabase(':memory:')).toEqual({ path: ':memory:', exists: true })
    expect(describeDatabase('file:portal?mode=memory&cache=shared').exists).toBe(true)
  })

  it('checks the file behind a file: URI', () => {
    const existing = path.join(dir, 'present.db')
    fs.writeFileSync(existing, '')

    expect(describeDatabase(`file://${existing}`)).toEqual({ path: `file://${existing}`, exists: true })
    expect(describeDatabase(`file://${path.join(dir, 'absent.db')}?cache=shared`).exists).toBe(false)
  })

  it('resolves plain paths and checks them on disk', () => {
    const missing = path.join(dir, 'nested', 'portal.db')

    expect(describeDatabase(missing)).toEqual({ path: missing, exists: false })
  })
})
