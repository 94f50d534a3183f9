/**
 * API Types
 *
 * Error envelope and error codes shared by the portal server and its tests.
 */

/**
 * API Error Codes
 * Standardized error codes for every JSON error response
 */
export enum ApiErrorCode {
  // Request errors
  PAYLOAD_TOO_LARGE = "PAYLOAD_TOO_LARGE",
  NOT_FOUND = "NOT_FOUND",

  // Processing errors
  STORAGE_ERROR = "STORAGE_ERROR",

  // System errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * httpStatus: the HTTP status the backend should return for this code
 * defaultMessage: developer-facing default message
 */
export interface ApiErrorDefinition {
  code: ApiErrorCode
  httpStatus: number
  defaultMessage: string
}

export const API_ERROR_DEFINITIONS: Record<ApiErrorCode, ApiErrorDefinition> = {
  [ApiErrorCode.PAYLOAD_TOO_LARGE]: {
    code: ApiErrorCode.PAYLOAD_TOO_LARGE,
    httpStatus: 413,
    defaultMessage: "Request body is too large"
  },
  [ApiErrorCode.NOT_FOUND]: {
    code: ApiErrorCode.NOT_FOUND,
    httpStatus: 404,
    defaultMessage: "Resource not found"
  },
  [ApiErrorCode.STORAGE_ERROR]: {
    code: ApiErrorCode.STORAGE_ERROR,
    httpStatus: 500,
    defaultMessage: "Storage operation failed"
  },
  [ApiErrorCode.INTERNAL_ERROR]: {
    code: ApiErrorCode.INTERNAL_ERROR,
    httpStatus: 500,
    defaultMessage: "Unexpected internal error"
  }
}

export const DEFAULT_API_ERROR_DEFINITION: ApiErrorDefinition = API_ERROR_DEFINITIONS[ApiErrorCode.INTERNAL_ERROR]

const isApiErrorCode = (code: string): code is ApiErrorCode =>
  Object.prototype.hasOwnProperty.call(API_ERROR_DEFINITIONS, code)

export const getApiErrorDefinition = (code?: ApiErrorCode | string | null): ApiErrorDefinition => {
  if (!code) return DEFAULT_API_ERROR_DEFINITION
  if (isApiErrorCode(code)) {
    return API_ERROR_DEFINITIONS[code]
  }
  return DEFAULT_API_ERROR_DEFINITION
}

/**
 * Generic API error response
 * Body of every JSON error response
 */
export interface ApiErrorResponse {
  success: false
  error: {
    code: ApiErrorCode | string
    message: string
    details?: Record<string, unknown>
    stack?: string // Only in development
  }
}
