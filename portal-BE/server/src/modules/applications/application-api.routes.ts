import { Router } from 'express'
import type {
  ApplicationDebugResponse,
  ApplicationStatusResponse,
  DebugSubmission
} from '@apply-portal/shared'
import type { AppConfig } from '../../config/app-config'
import { describeDatabase } from '../../db/sqlite'
import { asyncHandler } from '../../utils/async-handler'
import type { ApplicationStore } from './application.repository'

export const DEBUG_RECENT_LIMIT = 10

export interface ApplicationApiDeps {
  config: Pick<AppConfig, 'databasePath'>
  store: ApplicationStore
}

export function buildApplicationApiRouter({ config, store }: ApplicationApiDeps) {
  const router = Router()

  router.get(
    '/status',
    asyncHandler((_req, res) => {
      const database = describeDatabase(config.databasePath)
      const response: ApplicationStatusResponse = {
        total_applications: store.count(),
        bot_submissions: store.count({ source: 'bot' }),
        direct_submissions: store.count({ source: 'direct' }),
        database_path: database.path,
        database_exists: database.exists,
        timestamp: new Date().toISOString()
      }
      res.json(response)
    })
  )

  router.get(
    '/debug',
    asyncHandler((_req, res) => {
      const recent: DebugSubmission[] = store.mostRecent(DEBUG_RECENT_LIMIT).map((app) => ({
        id: app.id,
        first_name: app.firstName,
        last_name: app.lastName,
        email: app.email,
        source: app.source,
        submitted_at: app.submittedAt || null,
        resume: Boolean(app.resumeFilename)
      }))
      const response: ApplicationDebugResponse = {
        recent_submissions: recent,
        total_count: store.count()
      }
      res.json(response)
    })
  )

  return router
}
