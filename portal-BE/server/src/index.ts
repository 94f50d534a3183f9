import { env } from './config/env'
import { buildAppConfig } from './config/app-config'
import { buildApp } from './app'
import { logger } from './logger'
import { closeDb, getDb } from './db/sqlite'
import { ApplicationRepository } from './modules/applications/application.repository'
import { LocalUploadStore } from './modules/uploads/upload-store'
import { createDrainManager } from './modules/lifecycle/drain-manager'

async function main() {
  const config = buildAppConfig(env)

  // Touch DB early to surface migration issues fast
  const store = new ApplicationRepository(getDb())
  const uploads = new LocalUploadStore(config.uploadDir)
  await uploads.ensureDir()

  const app = buildApp({ config, store, uploads })
  const server = app.listen(env.PORT, () => {
    logger.info(
      { port: env.PORT, uploadDir: uploads.rootDir, database: config.databasePath },
      'Application portal listening'
    )
  })

  const { drain } = createDrainManager(server, env.DRAIN_TIMEOUT_MS)

  let shuttingDown = false
  const shutdown = async (reason: string) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info({ reason }, 'Shutting down application portal')
    await drain()
    closeDb()
    process.exit(0)
  }

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed')
      process.exit(1)
    })
  }
  process.on('SIGTERM', onSignal)
  process.on('SIGINT', onSignal)
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Failed to start application portal')
  process.exit(1)
})
