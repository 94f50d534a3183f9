import type { RequestHandler } from 'express'
import { PayloadTooLargeError } from '../modules/applications/application.errors'

/**
 * Refuses a request whose declared Content-Length is above `maxBytes` before
 * any of the body is parsed. Streamed bodies are capped by the body parsers.
 */
export function payloadLimit(maxBytes: number): RequestHandler {
  return (req, _res, next) => {
    const declared = Number(req.headers['content-length'])
    if (Number.isFinite(declared) && declared > maxBytes) {
      next(new PayloadTooLargeError(maxBytes))
      return
    }
    next()
  }
}

export function isPayloadTooLarge(err: unknown): boolean {
  if (err instanceof PayloadTooLargeError) return true
  // body-parser marks its own limit errors this way
  return err instanceof Error && Reflect.get(err, 'type') === 'entity.too.large'
}

const MIB = 1024 * 1024

/** 16777216 -> "16MB", 1024 -> "1KB" */
export function formatByteLimit(bytes: number): string {
  if (bytes >= MIB) return `${Number((bytes / MIB).toFixed(1))}MB`
  if (bytes >= 1024) return `${Number((bytes / 1024).toFixed(1))}KB`
  return `${bytes} bytes`
}
