import express from 'express'
import helmet from 'helmet'
import { ApiErrorCode } from '@apply-portal/shared'
import type { AppConfig } from './config/app-config'
import { httpLogger } from './logger'
import { buildHealthHandler } from './routes/health'
import { buildApplicationRouter } from './modules/applications/application.routes'
import { buildApplicationApiRouter } from './modules/applications/application-api.routes'
import type { ApplicationStore } from './modules/applications/application.repository'
import { buildPagesRouter } from './modules/pages/pages.routes'
import { buildUploadRouter } from './modules/uploads/upload.routes'
import type { UploadStore } from './modules/uploads/upload-store'
import { ApiHttpError, apiErrorHandler } from './middleware/api-error'

export interface AppDeps {
  config: AppConfig
  store: ApplicationStore
  uploads: UploadStore
}

export function buildApp({ config, store, uploads }: AppDeps) {
  const app = express()

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          // Successful submissions redirect to the downstream tracker; browsers apply form-action to that hop
          formAction: ["'self'", new URL(config.l1RedirectUrl).origin]
        }
      }
    })
  )
  app.use(httpLogger)

  // Status endpoints reflect live counts; never serve them from a cache
  const noStore: express.RequestHandler = (_req, res, next) => {
    res.set('Cache-Control', 'no-store, no-cache, must-revalidate')
    res.set('Pragma', 'no-cache')
    res.set('Expires', '0')
    next()
  }

  app.use(buildApplicationRouter({ config, store, uploads }))
  app.use(buildPagesRouter(config))
  app.use('/uploads', buildUploadRouter(uploads))
  app.use('/api', noStore, buildApplicationApiRouter({ config, store }))
  app.get('/health', noStore, buildHealthHandler({ store, uploads }))

  app.use((req, _res, next) => {
    next(new ApiHttpError(ApiErrorCode.NOT_FOUND, 'Resource not found', { status: 404, details: { path: req.path } }))
  })

  app.use(apiErrorHandler)

  return app
}
