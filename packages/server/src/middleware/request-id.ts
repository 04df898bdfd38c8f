import type { Context } from "hono"
import type { Middleware } from "../server/server"
import type { EnabledRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

const TRACE_ID = /^[0-9a-f]{32}$/i
const ZERO_TRACE_ID = /^0{32}$/

/**
 * The trace-id of a W3C traceparent (`version-traceid-parentid-flags`),
 * if valid.
 */
export function traceIdFromTraceparent(
  traceparent: string,
): string | undefined {
  const parts = traceparent.split("-")
  const traceId = parts.length >= 4 ? parts[1] : undefined

  if (
    traceId === undefined ||
    !TRACE_ID.test(traceId) ||
    ZERO_TRACE_ID.test(traceId)
  ) {
    return undefined
  }

  return traceId
}

function resolveRequestId(
  c: Context,
  config: Required<EnabledRequestIdConfig>,
): string {
  const existing = c.get("requestId")
  if (isNonEmptyString(existing)) return existing

  const fromHeader = c.req.header(config.header)
  if (isNonEmptyString(fromHeader)) return fromHeader

  if (config.fallbackToTraceparent) {
    const traceparent = c.req.header("traceparent")
    const traceId = traceparent
      ? traceIdFromTraceparent(traceparent)
      : undefined

    if (traceId) return traceId
  }

  return config.generate()
}

/**
 * Resolves the request id, stores it on the context and echoes it on the
 * response.
 */
export function requestIdMiddleware(
  config: Required<EnabledRequestIdConfig>,
): Middleware {
  return async (c, next) => {
    const requestId = resolveRequestId(c, config)

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, config.header.toLowerCase(), requestId)
  }
}
