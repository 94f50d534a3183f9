import type Database from 'better-sqlite3'
import {
  isApplicationSource,
  type ApplicationCountFilter,
  type ApplicationRecord,
  type NewApplication
} from '@apply-portal/shared'
import { getDb } from '../../db/sqlite'
import { StorageError } from './application.errors'

type ApplicationRow = {
  id: number
  first_name: string
  last_name: string
  email: string
  phone: string | null
  country: string | null
  city: string | null
  address: string | null
  position: string | null
  additional_info: string | null
  resume_filename: string | null
  submitted_at: string
  source: string
  ip_address: string | null
}

type InsertParams = {
  firstName: string
  lastName: string
  email: string
  phone: string | null
  country: string | null
  city: string | null
  address: string | null
  position: string | null
  additionalInfo: string | null
  resumeFilename: string | null
  now: string
  source: string
  ipAddress: string | null
}

const buildApplication = (row: ApplicationRow): ApplicationRecord => {
  if (!isApplicationSource(row.source)) {
    throw new StorageError(`Application ${row.id} has unknown source "${row.source}"`)
  }
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    phone: row.phone,
    country: row.country,
    city: row.city,
    address: row.address,
    position: row.position,
    additionalInfo: row.additional_info,
    resumeFilename: row.resume_filename,
    submittedAt: row.submitted_at,
    source: row.source,
    ipAddress: row.ip_address
  }
}

/**
 * Table store for submitted applications. Insert and read only: nothing in
 * the system updates or deletes an application.
 */
export interface ApplicationStore {
  /** Assigns id and submitted_at. Throws StorageError; a failed insert leaves no row. */
  insert(input: NewApplication): ApplicationRecord
  /** Every application, newest first. */
  listAll(): ApplicationRecord[]
  count(filter?: ApplicationCountFilter): number
  /** Newest first, at most `limit` rows. */
  mostRecent(limit: number): ApplicationRecord[]
  /** Throws StorageError when the store cannot answer a trivial query. */
  ping(): void
}

const NEWEST_FIRST = 'ORDER BY submitted_at DESC, id DESC'

export class ApplicationRepository implements ApplicationStore {
  private db: Database.Database
  private readonly insertTx: (input: NewApplication) => ApplicationRecord

  constructor(db: Database.Database = getDb()) {
    this.db = db

    // submitted_at never goes below the newest stored timestamp, even if the clock steps back
    const insertStmt = this.db.prepare<InsertParams>(`
      INSERT INTO applications (
        first_name, last_name, email, phone, country, city, address, position,
        additional_info, resume_filename, submitted_at, source, ip_address
      ) VALUES (
        @firstName, @lastName, @email, @phone, @country, @city, @address, @position,
        @additionalInfo, @resumeFilename,
        MAX(@now, COALESCE((SELECT MAX(submitted_at) FROM applications), @now)),
        @source, @ipAddress
      )
    `)
    const selectById = this.db.prepare<[number | bigint], ApplicationRow>('SELECT * FROM applications WHERE id = ?')

    this.insertTx = this.db.transaction((input: NewApplication) => {
      const result = insertStmt.run({ ...input, now: new Date().toISOString() })
      const row = selectById.get(result.lastInsertRowid)
      if (!row) {
        throw new StorageError('Inserted application could not be read back')
      }
      return buildApplication(row)
    })
  }

  insert(input: NewApplication): ApplicationRecord {
    return this.guard('Failed to save application', () => this.insertTx(input))
  }

  listAll(): ApplicationRecord[] {
    return this.guard('Failed to list applications', () =>
      this.db.prepare<[], ApplicationRow>(`SELECT * FROM applications ${NEWEST_FIRST}`).all().map(buildApplication)
    )
  }

  count(filter: ApplicationCountFilter = {}): number {
    return this.guard('Failed to count applications', () => {
      if (filter.source) {
        const row = this.db
          .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM applications WHERE source = ?')
          .get(filter.source)
        return row?.count ?? 0
      }
      const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM applications').get()
      return row?.count ?? 0
    })
  }

  mostRecent(limit: number): ApplicationRecord[] {
    return this.guard('Failed to load recent applications', () =>
      this.db
        .prepare<[number], ApplicationRow>(`SELECT * FROM applications ${NEWEST_FIRST} LIMIT ?`)
        .all(limit)
        .map(buildApplication)
    )
  }

  ping(): void {
    this.guard('Database is unreachable', () => {
      this.db.prepare('SELECT 1').get()
    })
  }

  private guard<T>(message: string, operation: () => T): T {
    try {
      return operation()
    } catch (err) {
      if (err instanceof StorageError) throw err
      throw new StorageError(`${message}: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
    }
  }
}
