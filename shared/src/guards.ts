/**
 * Runtime type guards for values read back from storage or cookies.
 */

import { APPLICATION_SOURCES } from "./application.types"
import type { ApplicationSource, FlashMessage } from "./application.types"

export function isApplicationSource(value: unknown): value is ApplicationSource {
  return typeof value === "string" && APPLICATION_SOURCES.some((source) => source === value)
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function isFlashMessage(value: unknown): value is FlashMessage {
  if (!isObject(value)) return false
  return (value.category === "success" || value.category === "error") && typeof value.message === "string"
}
