import fs from 'node:fs/promises'
import path from 'node:path'
import { isFlashMessage, type FlashMessage, type NewApplication } from '@apply-portal/shared'
import { buildApp } from '../src/app'
import type { AppConfig } from '../src/config/app-config'
import { getDb } from '../src/db/sqlite'
import { ApplicationRepository } from '../src/modules/applications/application.repository'
import { LocalUploadStore } from '../src/modules/uploads/upload-store'

export const TEST_L1_URL = 'https://apply.example.com/submit'

export const BROWSER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36'

export const buildNewApplication = (overrides: Partial<NewApplication> = {}): NewApplication => ({
  firstName: 'Ada',
  lastName: 'Lovelace',
  email: 'ada@example.com',
  phone: null,
  country: null,
  city: null,
  address: null,
  position: null,
  additionalInfo: null,
  resumeFilename: null,
  source: 'direct',
  ipAddress: '127.0.0.1',
  ...overrides
})

/**
 * Fresh app over the shared in-memory database (emptied) and a new upload directory.
 */
export async function createTestContext(overrides: Partial<AppConfig> = {}) {
  const uploadRoot = process.env.UPLOAD_DIR ?? '/tmp'
  const uploadDir = await fs.mkdtemp(path.join(uploadRoot, 'run-'))
  const config: AppConfig = {
    databasePath: ':memory:',
    uploadDir,
    maxContentLength: 16 * 1024 * 1024,
    l1RedirectUrl: TEST_L1_URL,
    cookieSecure: false,
    ...overrides
  }

  const db = getDb()
  db.prepare('DELETE FROM applications').run()

  const store = new ApplicationRepository(db)
  const uploads = new LocalUploadStore(uploadDir)
  await uploads.ensureDir()

  return {
    config,
    db,
    store,
    uploads,
    app: buildApp({ config, store, uploads }),
    cleanup: () => fs.rm(uploadDir, { recursive: true, force: true })
  }
}

/** Flash messages set by a response, decoded from its Set-Cookie header. */
export function readFlashCookie(res: { headers: Record<string, unknown> }): FlashMessage[] {
  const header = res.headers['set-cookie']
  const cookies = (Array.isArray(header) ? header : [header]).filter(
    (cookie): cookie is string => typeof cookie === 'string'
  )
  const flash = cookies.find((cookie) => cookie.startsWith('flash='))
  if (!flash) return []
  const value = decodeURIComponent(flash.slice('flash='.length).split(';')[0])
  if (!value) return []
  const parsed: unknown = JSON.parse(value)
  return Array.isArray(parsed) ? parsed.filter(isFlashMessage) : []
}

/** Cookie header that replays flash messages on the next request. */
export const flashCookieHeader = (messages: FlashMessage[]) =>
  `flash=${encodeURIComponent(JSON.stringify(messages))}`
