import type { Logger } from "@usercache/logger"
import type { Middleware } from "../server/server"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Puts a child logger bound to the request id on the context. */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    if (!c.get("logger")) {
      const requestId = c.get("requestId")

      const bindings = isNonEmptyString(requestId) ? { requestId } : {}
      c.set("logger", baseLogger.child(bindings))
    }

    await next()
  }
}
