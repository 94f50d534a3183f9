import type { Request, Response } from 'express'
import type { HealthResponse } from '@apply-portal/shared'
import { isDraining } from '../modules/lifecycle/readiness'
import type { ApplicationStore } from '../modules/applications/application.repository'
import type { UploadStore } from '../modules/uploads/upload-store'

export interface HealthDeps {
  store: Pick<ApplicationStore, 'ping'>
  uploads: Pick<UploadStore, 'exists'>
}

export function buildHealthHandler({ store, uploads }: HealthDeps) {
  return function healthHandler(_req: Request, res: Response): void {
    let database = 'healthy'
    try {
      store.ping()
    } catch (err) {
      database = `error: ${err instanceof Error ? err.message : String(err)}`
    }

    const draining = isDraining()
    const body: HealthResponse = {
      status: draining ? 'draining' : 'ok',
      timestamp: new Date().toISOString(),
      database,
      upload_folder: uploads.exists()
    }

    if (draining) {
      res.status(503).json(body)
      return
    }

    res.json(body)
  }
}
