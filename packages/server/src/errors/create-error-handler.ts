import type { ErrorCode } from "@usercache/errors"
import type { Logger } from "@usercache/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import { routePath } from "hono/route"
import type { StatusCode } from "../http/status-codes"
import { isNonEmptyString } from "../middleware/utils/is-non-empty-string"
import type { ErrorHandling } from "../server/server-options"
import {
  createErrorFormatter,
  type ErrorMappingsConfig,
} from "./error-formatter"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(
  errorHandling: ErrorHandling,
  logger: Logger,
): ErrorHandler {
  if (errorHandling.kind === "handler") return errorHandling.errorHandler

  return buildErrorHandler(errorHandling.config, logger)
}

export type CreateErrorHandlerFn = typeof createErrorHandler

function buildErrorHandler(
  mappings: ErrorMappingsConfig,
  logger: Logger,
): ErrorHandler {
  const format = createErrorFormatter(mappings)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = format(err, requestId)
    const matched = routePath(c)

    logError(logger, err, {
      requestId,
      method: c.req.method,
      route: isNonEmptyString(matched) ? matched : c.req.path,
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, response.error.status)
  }
}

type ErrorLogMeta = {
  requestId: string
  method: string
  route: string
  status: StatusCode
  code: ErrorCode
}

/** 5xx log at error with `err`; 4xx log at info, with `err` only at debug. */
function logError(logger: Logger, err: unknown, meta: ErrorLogMeta): void {
  const base = { ...meta, op: `${meta.method} ${meta.route}` }

  if (meta.status >= 500) {
    logger.error("Request failed", { ...base, err })
    return
  }

  logger.info("Request failed", base)
  logger.debug("Request failed details", { ...base, err })
}
