import Database from 'better-sqlite3'
import fs from 'node:fs'
import path from 'node:path'
import { env } from '../config/env'
import { logger } from '../logger'
import { runMigrations } from './migrations'

let db: Database.Database | null = null

/** `:memory:` and `file:` URIs are handed to SQLite untouched. */
const isPlainFilePath = (databasePath: string) => databasePath !== ':memory:' && !databasePath.startsWith('file:')

export function openDatabase(databasePath: string): Database.Database {
  const plainFile = isPlainFilePath(databasePath)
  const dbPath = plainFile ? path.resolve(databasePath) : databasePath

  if (plainFile && !fs.existsSync(path.dirname(dbPath))) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })
  }

  logger.info({ dbPath }, 'Opening SQLite database')

  const connection = new Database(dbPath, {
    verbose: env.NODE_ENV === 'development' ? (message) => logger.trace({ sql: message }, 'sqlite') : undefined
  })
  connection.pragma('journal_mode = WAL')
  connection.pragma('busy_timeout = 15000')
  connection.pragma('synchronous = NORMAL')

  runMigrations(connection)
  return connection
}

export function getDb(): Database.Database {
  if (db) {
    return db
  }
  db = openDatabase(env.DATABASE_PATH)
  return db
}

export function closeDb(): void {
  if (!db) return
  logger.info('Closing SQLite database')
  db.close()
  db = null
}

export interface DatabaseDescription {
  path: string
  exists: boolean
}

/**
 * File named by a SQLite `file:` URI, or null for an in-memory URI.
 * `file:data.db`, `file:///var/db/data.db` and `file://localhost/var/db/data.db` all name files.
 */
export function sqliteUriFile(uri: string): string | null {
  const [location, query = ''] = uri.slice('file:'.length).split('?', 2)
  if (new URLSearchParams(query).get('mode') === 'memory') return null

  let filePath = location
  if (filePath.startsWith('//')) {
    const hostEnd = filePath.indexOf('/', 2)
    filePath = hostEnd === -1 ? '' : filePath.slice(hostEnd)
  }
  filePath = decodeURIComponent(filePath)
  return filePath && filePath !== ':memory:' ? filePath : null
}

/**
 * Where the database lives and whether its file is on disk.
 * In-memory databases have no file to look for and count as present.
 */
export function describeDatabase(databasePath: string): DatabaseDescription {
  if (databasePath === ':memory:') {
    return { path: databasePath, exists: true }
  }
  if (databasePath.startsWith('file:')) {
    const file = sqliteUriFile(databasePath)
    return { path: databasePath, exists: file === null || fs.existsSync(path.resolve(file)) }
  }
  const resolved = path.resolve(databasePath)
  return { path: resolved, exists: fs.existsSync(resolved) }
}
