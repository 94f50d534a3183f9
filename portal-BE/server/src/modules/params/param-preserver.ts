import type { Request } from 'express'
import type { PreservedParams } from '@apply-portal/shared'

/** Campaign tracking keys that must survive every redirect. */
export function isPreservedKey(key: string): boolean {
  return key === 'gclid' || key.startsWith('utm_')
}

/**
 * Picks the `gclid` and `utm_*` parameters out of a query string, keeping the
 * first value of each key in order of first appearance.
 */
export function extractPreservedParams(search: URLSearchParams): PreservedParams {
  const preserved: PreservedParams = {}
  for (const [key, value] of search) {
    if (isPreservedKey(key) && !Object.prototype.hasOwnProperty.call(preserved, key)) {
      preserved[key] = value
    }
  }
  return preserved
}

/**
 * Preserved parameters of the current request. Reads the raw query string so
 * ordering and repeated keys behave the same whatever query parser Express uses.
 */
export function preservedParamsFor(req: Request): PreservedParams {
  const queryStart = req.originalUrl.indexOf('?')
  if (queryStart === -1) return {}
  return extractPreservedParams(new URLSearchParams(req.originalUrl.slice(queryStart + 1)))
}

/**
 * Appends preserved (and extra) parameters to `basePath`. Extra values win over
 * preserved values of the same key; `basePath` comes back untouched when there
 * is nothing to append.
 */
export function buildRedirectUrl(
  basePath: string,
  preserved: PreservedParams,
  extra: Record<string, string> = {}
): string {
  const params = { ...preserved, ...extra }
  const query = new URLSearchParams(params).toString()
  if (!query) return basePath
  return `${basePath}?${query}`
}
