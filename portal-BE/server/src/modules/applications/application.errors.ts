import { ApiErrorCode } from '@apply-portal/shared'

/** The record store or upload directory could not complete a write or read. */
export class StorageError extends Error {
  readonly code = ApiErrorCode.STORAGE_ERROR

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StorageError'
  }
}

/** Request body exceeded the configured maximum before it reached validation. */
export class PayloadTooLargeError extends Error {
  readonly code = ApiErrorCode.PAYLOAD_TOO_LARGE
  readonly status = 413

  constructor(readonly limitBytes: number, options?: { cause?: unknown }) {
    super(`Request body exceeds ${limitBytes} bytes`, options)
    this.name = 'PayloadTooLargeError'
  }
}
