import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ApplicationRepository } from '../application.repository'
import { StorageError } from '../application.errors'
import { getDb } from '../../../db/sqlite'
import { buildNewApplication } from '../../../../tests/helpers'

describe('ApplicationRepository', () => {
  const db = getDb()
  const repo = new ApplicationRepository(db)

  beforeEach(() => {
    db.prepare('DELETE FROM applications').run()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('insert', () => {
    it('assigns identity and timestamp and stores every field', () => {
      const record = repo.insert(
        buildNewApplication({
          phone: '+1 555 0100',
          country: 'United Kingdom',
          city: 'London',
          address: '12 St James Square',
          position: 'Analyst',
          additionalInfo: 'Available from March',
          resumeFilename: 'ada.pdf',
          source: 'bot',
          ipAddress: '10.0.0.7'
        })
      )

      expect(record.id).toBeGreaterThan(0)
      expect(Number.isNaN(Date.parse(record.submittedAt))).toBe(false)
      expect(record).toMatchObject({
        firstName: 'Ada',
        lastName: 'Lovelace',
        email: 'ada@example.com',
        phone: '+1 555 0100',
        country: 'United Kingdom',
        city: 'London',
        address: '12 St James Square',
        position: 'Analyst',
        additionalInfo: 'Available from March',
        resumeFilename: 'ada.pdf',
        source: 'bot',
        ipAddress: '10.0.0.7'
      })
    })

    it('hands out strictly increasing ids and non-decreasing timestamps', () => {
      const records = [1, 2, 3, 4, 5].map((n) => repo.insert(buildNewApplication({ email: `applicant${n}@example.com` })))

      for (let i = 1; i < records.length; i++) {
        expect(records[i].id).toBeGreaterThan(records[i - 1].id)
        expect(records[i].submittedAt >= records[i - 1].submittedAt).toBe(true)
      }
    })

    it('never stamps a record earlier than the newest one, even when the clock steps back', () => {
      vi.useFakeTimers({ toFake: ['Date'] })
      vi.setSystemTime(new Date('2030-06-01T12:00:00.000Z'))
      const first = repo.insert(buildNewApplication())

      vi.setSystemTime(new Date('2029-01-01T00:00:00.000Z'))
      const second = repo.insert(buildNewApplication({ email: 'second@example.com' }))

      expect(first.submittedAt).toBe('2030-06-01T12:00:00.000Z')
      expect(second.submittedAt).toBe('2030-06-01T12:00:00.000Z')
      expect(second.id).toBeGreaterThan(first.id)
    })

    it('raises StorageError and leaves no row when a constraint fails', () => {
      repo.insert(buildNewApplication())

      expect(() => repo.insert(buildNewApplication({ firstName: '' }))).toThrow(StorageError)
      expect(repo.count()).toBe(1)
    })
  })

  describe('reads', () => {
    it('lists everything newest first', () => {
      const a = repo.insert(buildNewApplication({ firstName: 'First' }))
      const b = repo.insert(buildNewApplication({ firstName: 'Second' }))
      const c = repo.insert(buildNewApplication({ firstName: 'Third' }))

      expect(repo.listAll().map((record) => record.id)).toEqual([c.id, b.id, a.id])
    })

    it('counts in total and by source', () => {
      repo.insert(buildNewApplication({ source: 'bot' }))
      repo.insert(buildNewApplication({ source: 'bot' }))
      repo.insert(buildNewApplication({ source: 'direct' }))

      expect(repo.count()).toBe(3)
      expect(repo.count({ source: 'bot' })).toBe(2)
      expect(repo.count({ source: 'direct' })).toBe(1)
    })

    it('caps mostRecent at the requested size', () => {
      const ids = Array.from({ length: 4 }, (_, n) => repo.insert(buildNewApplication({ email: `a${n}@example.com` })).id)

      const recent = repo.mostRecent(2)

      expect(recent.map((record) => record.id)).toEqual([ids[3], ids[2]])
    })

    it('answers a ping while the database is open', () => {
      expect(() => repo.ping()).not.toThrow()
    })
  })
})
