import { Router } from 'express'
import { stat } from 'node:fs/promises'
import { ApiErrorCode } from '@apply-portal/shared'
import { asyncHandler } from '../../utils/async-handler'
import { ApiHttpError } from '../../middleware/api-error'
import type { UploadStore } from './upload-store'

export function buildUploadRouter(uploads: UploadStore) {
  const router = Router()

  router.get(
    '/:filename',
    asyncHandler(async (req, res) => {
      const filename = req.params.filename
      const notFound = () =>
        new ApiHttpError(ApiErrorCode.NOT_FOUND, 'Upload not found', { details: { filename } })

      const absolutePath = uploads.resolve(filename)
      if (!absolutePath) {
        throw notFound()
      }

      try {
        const fileStats = await stat(absolutePath)
        if (!fileStats.isFile()) throw notFound()
      } catch (error) {
        if (error instanceof ApiHttpError) throw error
        if (error instanceof Error && Reflect.get(error, 'code') === 'ENOENT') throw notFound()
        throw new ApiHttpError(ApiErrorCode.STORAGE_ERROR, 'Failed to load upload', { cause: error })
      }

      await new Promise<void>((resolve, reject) => {
        res.sendFile(absolutePath, { dotfiles: 'deny' }, (err) => (err ? reject(err) : resolve()))
      })
    })
  )

  return router
}
