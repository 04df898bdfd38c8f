import { type AppError, type ErrorCode, isAppError } from "@usercache/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /**
   * User-facing message. When omitted, the error's own message is exposed,
   * so leave it out only for codes whose messages are written for clients.
   */
  message?: string
}

export type FallbackMapping = {
  code: ErrorCode
  status: StatusCode
  message: string
}

export type ErrorContextTransformer = (
  error: AppError,
) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /**
   * Error code to status and message. Unmapped AppErrors keep their code but
   * take the fallback status and message.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** Used for unmapped codes and for values that are not AppErrors. */
  fallback?: FallbackMapping

  /**
   * Extra body fields derived from the error. A throwing transformer adds
   * none.
   */
  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (
  error: unknown,
  requestId: string,
) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(
  config: ErrorMappingsConfig,
): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]

    return {
      error: {
        ...extractExtraContext(config, error),
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping
          ? (mapping.message ?? error.message)
          : fallback.message,
        requestId,
      },
    }
  }
}

function extractExtraContext(
  config: ErrorMappingsConfig,
  error: AppError,
): Record<string, unknown> {
  try {
    return config.transformContext?.(error) ?? {}
  } catch {
    return {}
  }
}
