import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  app: Application
  options: ResolvedServerOptions
  isReady: () => boolean
  errorHandler: ErrorHandler
  defaultMiddleware: Middleware[]
}

/**
 * Wires an app in a fixed order: health routes (outside all middleware),
 * default middleware, `pre`, routes, `post`, then the error handler.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { app, options } = ctx

  registerHealthRoutes(app, options.health, ctx.isReady)

  applyMiddleware(app, ctx.defaultMiddleware)
  applyMiddleware(app, options.middleware.pre)
  options.routes(app)
  applyMiddleware(app, options.middleware.post)

  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp

function applyMiddleware(
  app: Application,
  middleware: readonly Middleware[],
): void {
  for (const mw of middleware) app.use("*", mw)
}
