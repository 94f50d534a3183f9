import path from 'node:path'
import type { Env } from './env'

/**
 * Everything a request handler needs to know about the deployment.
 * Built once at startup and passed down explicitly.
 */
export interface AppConfig {
  databasePath: string
  uploadDir: string
  /** Largest accepted request body, in bytes */
  maxContentLength: number
  l1RedirectUrl: string
  cookieSecure: boolean
}

export function buildAppConfig(source: Env): AppConfig {
  return {
    databasePath: source.DATABASE_PATH,
    uploadDir: path.resolve(source.UPLOAD_DIR),
    maxContentLength: source.MAX_CONTENT_LENGTH,
    l1RedirectUrl: source.L1_REDIRECT_URL,
    cookieSecure: source.COOKIE_SECURE ?? source.NODE_ENV === 'production'
  }
}
