import type { Logger } from "@usercache/logger"
import { routePath } from "hono/route"
import type { Middleware } from "../server/server"
import type {
  EnabledRequestLoggingConfig,
  PathString,
} from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/**
 * Logs one `Request completed` line per request: 5xx at error, everything
 * else at the configured level.
 */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  baseLogger: Logger,
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (shouldIgnore(path, config.ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const method = c.req.method
      const matched = routePath(c)
      const route = isNonEmptyString(matched) ? matched : path
      const userAgent = c.req.header("user-agent")

      const meta = {
        method,
        path,
        route,
        op: `${method} ${route}`,
        status,
        durationMs: Math.round(performance.now() - start),
        error: status >= 500,
        ...(userAgent !== undefined && { userAgent }),
      }

      const logger = c.get("logger") ?? baseLogger.child({
        requestId: c.get("requestId") ?? "unknown",
      })

      if (status >= 500) logger.error("Request completed", meta)
      else logger[config.level]("Request completed", meta)
    }
  }
}

function shouldIgnore(
  path: string,
  ignorePaths: readonly PathString[],
): boolean {
  return ignorePaths.some(
    (ignored) => path === ignored || path.startsWith(`${ignored}/`),
  )
}
