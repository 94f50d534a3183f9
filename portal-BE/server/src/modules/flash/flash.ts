import type { Request, Response } from 'express'
import { parse as parseCookie } from 'cookie'
import { isFlashMessage, type FlashMessage } from '@apply-portal/shared'
import { logger } from '../../logger'

export const FLASH_COOKIE = 'flash'

export interface FlashCookieOptions {
  secure: boolean
}

const cookieSettings = (options: FlashCookieOptions) => ({
  httpOnly: true,
  secure: options.secure,
  sameSite: 'lax' as const,
  path: '/'
})

function readFlash(req: Request): FlashMessage[] {
  const raw = req.headers.cookie ? parseCookie(req.headers.cookie)[FLASH_COOKIE] : undefined
  if (!raw) return []
  try {
    const value: unknown = JSON.parse(raw)
    return Array.isArray(value) ? value.filter(isFlashMessage) : []
  } catch (err) {
    logger.debug({ err }, 'Ignoring malformed flash cookie')
    return []
  }
}

/**
 * Queues a message for the next rendered page. Messages still waiting from an
 * earlier request are kept ahead of the new one.
 */
export function pushFlash(req: Request, res: Response, message: FlashMessage, options: FlashCookieOptions): void {
  const pending = [...readFlash(req), message]
  res.cookie(FLASH_COOKIE, JSON.stringify(pending), cookieSettings(options))
}

/** Returns pending messages and clears them so they show once. */
export function consumeFlash(req: Request, res: Response, options: FlashCookieOptions): FlashMessage[] {
  const messages = readFlash(req)
  if (req.headers.cookie && FLASH_COOKIE in parseCookie(req.headers.cookie)) {
    res.clearCookie(FLASH_COOKIE, cookieSettings(options))
  }
  return messages
}
