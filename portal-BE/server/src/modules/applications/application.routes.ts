import express, { Router, type ErrorRequestHandler, type RequestHandler } from 'express'
import multer from 'multer'
import type { AppConfig } from '../../config/app-config'
import { logger } from '../../logger'
import { asyncHandler } from '../../utils/async-handler'
import { formatByteLimit, isPayloadTooLarge, payloadLimit } from '../../middleware/payload-limit'
import { pushFlash, type FlashCookieOptions } from '../flash/flash'
import { buildRedirectUrl, preservedParamsFor } from '../params/param-preserver'
import { pageContext } from '../pages/page-context'
import { renderApplicationForm, renderApplicationsList } from '../pages/page.templates'
import type { UploadStore } from '../uploads/upload-store'
import { PayloadTooLargeError } from './application.errors'
import type { ApplicationStore } from './application.repository'
import { ApplicationSubmissionService, FORM_PATH, SUBMISSION_MESSAGES, type ResumeUpload } from './application.service'

export interface ApplicationRouterDeps {
  config: AppConfig
  store: ApplicationStore
  uploads: UploadStore
}

// Size and count limits; hitting any of them means the body is too large
const MULTER_SIZE_ERRORS = new Set([
  'LIMIT_FILE_SIZE',
  'LIMIT_FIELD_VALUE',
  'LIMIT_FILE_COUNT',
  'LIMIT_FIELD_COUNT',
  'LIMIT_PART_COUNT'
])

const MAX_FORM_FIELDS = 32

/** Bytes of every key and string value in a parsed multipart body. */
function fieldBytes(value: unknown): number {
  if (typeof value === 'string') return Buffer.byteLength(value)
  if (Array.isArray(value)) return value.reduce((total: number, item: unknown) => total + fieldBytes(item), 0)
  if (value && typeof value === 'object') {
    return Object.entries(value).reduce((total, [key, item]) => total + Buffer.byteLength(key) + fieldBytes(item), 0)
  }
  return 0
}

function multipartParser(maxBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    // Keep the client's full filename; sanitizeFilename strips directories itself
    preservePath: true,
    limits: {
      fileSize: maxBytes,
      fieldSize: maxBytes,
      files: 1,
      fields: MAX_FORM_FIELDS,
      parts: MAX_FORM_FIELDS + 1
    }
  }).any()

  return (req, res, next) => {
    upload(req, res, (err: unknown) => {
      if (err instanceof multer.MulterError && MULTER_SIZE_ERRORS.has(err.code)) {
        next(new PayloadTooLargeError(maxBytes, { cause: err }))
        return
      }
      if (err) {
        next(err)
        return
      }

      // Total across parts; a chunked body declares no Content-Length
      const received = uploadedFiles(req).reduce((total, file) => total + file.size, fieldBytes(req.body))
      if (received > maxBytes) {
        next(new PayloadTooLargeError(maxBytes))
        return
      }
      next()
    })
  }
}

function uploadedFiles(req: express.Request): Express.Multer.File[] {
  return Array.isArray(req.files) ? req.files : []
}

/**
 * The `resume` part, if the form sent one. A file input left blank arrives as
 * a part without a filename, which the multipart parser files under the text
 * fields; it becomes an upload with an empty name.
 */
function resumeUpload(files: Express.Multer.File[], fields: unknown): ResumeUpload | undefined {
  const file = files.find((candidate) => candidate.fieldname === 'resume')
  if (file) return { originalName: file.originalname, buffer: file.buffer }
  if (fields && typeof fields === 'object' && Object.prototype.hasOwnProperty.call(fields, 'resume')) {
    return { originalName: '', buffer: Buffer.alloc(0) }
  }
  return undefined
}

/**
 * Any error on the HTML routes ends in a redirect back to the form with a
 * message, never an error page.
 */
function formErrorHandler(config: AppConfig, cookie: FlashCookieOptions): ErrorRequestHandler {
  return (err, req, res, next) => {
    if (res.headersSent) {
      next(err)
      return
    }

    if (isPayloadTooLarge(err)) {
      logger.warn({ limit: config.maxContentLength, path: req.path }, 'Rejected oversized request body')
      pushFlash(
        req,
        res,
        { category: 'error', message: `File too large. Maximum size is ${formatByteLimit(config.maxContentLength)}.` },
        cookie
      )
    } else {
      logger.error({ err, path: req.path }, 'Unhandled error on application pages')
      pushFlash(req, res, { category: 'error', message: SUBMISSION_MESSAGES.internalError }, cookie)
    }

    res.redirect(buildRedirectUrl(FORM_PATH, preservedParamsFor(req)))
  }
}

export function buildApplicationRouter({ config, store, uploads }: ApplicationRouterDeps) {
  const router = Router()
  const cookie = { secure: config.cookieSecure }
  const service = new ApplicationSubmissionService({ store, uploads, config })

  router.get(FORM_PATH, (req, res) => {
    res.type('html').send(renderApplicationForm(pageContext(req, res, cookie)))
  })

  router.post(
    FORM_PATH,
    payloadLimit(config.maxContentLength),
    express.urlencoded({ extended: false, limit: config.maxContentLength }),
    multipartParser(config.maxContentLength),
    asyncHandler(async (req, res) => {
      const fields: unknown = req.body
      const files = uploadedFiles(req)
      const clientIp = req.get('x-real-ip') ?? req.ip ?? null

      logger.info(
        {
          clientIp,
          userAgent: req.get('user-agent'),
          fields: fields && typeof fields === 'object' ? Object.keys(fields) : [],
          files: files.map((file) => ({ field: file.fieldname, name: file.originalname, size: file.size }))
        },
        'Application submission received'
      )

      const outcome = await service.submit({
        fields,
        resume: resumeUpload(files, fields),
        userAgent: req.get('user-agent'),
        clientIp,
        preservedParams: preservedParamsFor(req)
      })

      pushFlash(req, res, outcome.flash, cookie)
      res.redirect(outcome.redirectUrl)
    })
  )

  router.get(
    '/applications',
    asyncHandler((req, res) => {
      const applications = store.listAll()
      logger.info({ total: applications.length }, 'Applications page accessed')
      res.type('html').send(renderApplicationsList(applications, pageContext(req, res, cookie)))
    })
  )

  router.use(formErrorHandler(config, cookie))

  return router
}
