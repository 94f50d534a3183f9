import type { Request, Response } from 'express'
import { consumeFlash, type FlashCookieOptions } from '../flash/flash'
import { preservedParamsFor } from '../params/param-preserver'
import type { PageContext } from './page.templates'

/** Preserved params plus any flash messages waiting for this render. */
export function pageContext(req: Request, res: Response, cookie: FlashCookieOptions): PageContext {
  return {
    queryParams: preservedParamsFor(req),
    flashes: consumeFlash(req, res, cookie)
  }
}
