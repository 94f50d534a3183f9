import type { Request, Response, NextFunction } from 'express'
import { ApiErrorCode, getApiErrorDefinition } from '@apply-portal/shared'
import { logger } from '../logger'
import { failure } from '../utils/api-response'

export class ApiHttpError extends Error {
  code: ApiErrorCode | string
  status: number
  details?: Record<string, unknown>

  constructor(
    code: ApiErrorCode | string,
    message?: string,
    options?: {
      status?: number
      details?: Record<string, unknown>
      cause?: unknown
    }
  ) {
    const definition = getApiErrorDefinition(code)
    super(message ?? definition.defaultMessage, options?.cause ? { cause: options.cause } : undefined)
    this.name = 'ApiHttpError'
    this.code = code
    this.status = options?.status ?? definition.httpStatus
    this.details = options?.details
  }
}

interface NormalizedError {
  code: ApiErrorCode | string
  message: string
  status: number
  details?: Record<string, unknown>
}

const readString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined)
const readNumber = (value: unknown): number | undefined => (typeof value === 'number' ? value : undefined)

const normalizeError = (err: unknown): NormalizedError => {
  if (err instanceof ApiHttpError) {
    return {
      code: err.code,
      message: err.message,
      status: err.status,
      details: err.details
    }
  }

  if (err instanceof Error) {
    const code = readString(Reflect.get(err, 'code'))
    const definition = getApiErrorDefinition(code ?? ApiErrorCode.INTERNAL_ERROR)
    // Codes we don't define (e.g. SQLITE_*) are reported as internal errors with their own status ignored
    const known = code !== undefined && definition.code === code

    return {
      code: known ? code : ApiErrorCode.INTERNAL_ERROR,
      message: known ? err.message : definition.defaultMessage,
      status: (known ? readNumber(Reflect.get(err, 'status')) : undefined) ?? definition.httpStatus
    }
  }

  const definition = getApiErrorDefinition(ApiErrorCode.INTERNAL_ERROR)
  return {
    code: ApiErrorCode.INTERNAL_ERROR,
    message: definition.defaultMessage,
    status: definition.httpStatus
  }
}

export const apiErrorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const normalized = normalizeError(err)

  const response = failure(normalized.code, normalized.message, {
    ...(normalized.details ?? {}),
    path: req.path
  })

  if (process.env.NODE_ENV !== 'production' && err instanceof Error && err.stack) {
    response.error.stack = err.stack
  }

  const logLevel = normalized.status >= 500 ? 'error' : 'warn'
  logger[logLevel]({ err, code: normalized.code, status: normalized.status, path: req.path }, 'API error response')

  if (res.headersSent) return
  res.status(normalized.status).json(response)
}
