import type { ApiErrorResponse, ApiErrorCode } from '@apply-portal/shared'

export const failure = (
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse => ({
  success: false,
  error: {
    code,
    message,
    ...(details ? { details } : {})
  }
})
