import { pingRedis } from "@usercache/cache"
import {
  type Application,
  createServer,
  type ErrorMappingsConfig,
  type LifecycleHook,
  type Server,
} from "@usercache/server"
import type { AppContext } from "../app/create-context"
import { createStartHooks, createStopHooks } from "../app/lifecycle"
import { pingMySql } from "../lib/mysql-client"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

/**
 * Client errors expose their own message; everything else falls back to a
 * 500.
 */
export const errorMappings: ErrorMappingsConfig = {
  mappings: {
    validation_error: { status: 400 },
    invalid_json_body: { status: 400 },
    missing_required_field: { status: 400 },
    missing_parameters: { status: 400 },
    cache_key_not_found: { status: 404 },
    cache_field_not_found: { status: 404 },
  },
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = createStartHooks(ctx)
  const stopHooks = createStopHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.core.clock,
      logger: ctx.services.core.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      startupTimeoutMs: ctx.config.server.startupTimeoutMs,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorHandling: { kind: "mappings", config: errorMappings },

      requestId: ctx.config.requestId.enabled
        ? {
            enabled: true,
            header: ctx.config.requestId.header,
            fallbackToTraceparent: ctx.config.requestId.fallbackToTraceparent,
          }
        : { enabled: false },

      requestLogging: ctx.config.requestLogging.enabled
        ? { enabled: true, level: ctx.config.requestLogging.level }
        : { enabled: false },

      health: {
        enabled: true,
        livenessPath: ctx.config.server.livenessPath,
        readinessPath: ctx.config.server.readinessPath,
        readinessChecks: [
          { name: "redis", fn: () => pingRedis(ctx.infra.redisClient) },
          { name: "mysql", fn: () => pingMySql(ctx.infra.mysqlPool) },
        ],
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.services.domains)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}
