import type { Milliseconds } from "@usercache/clock"
import { type LogLevelName, logLevelNames } from "@usercache/logger"
import { z } from "zod/mini"
import type { CacheFillFailurePolicy } from "../../domains/users/services/user-cache-coordinator"

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "User Cache Service"),
  SERVER_HOST: z._default(z.string(), "0.0.0.0"),

  SERVER_PORT: z._default(z.coerce.number(), 8080),
  SERVER_STARTUP_TIMEOUT_MS: z._default(z.coerce.number(), 30_000),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),
  SERVER_LIVENESS_PATH: z._default(
    z.templateLiteral(["/", z.string()]),
    "/health",
  ),
  SERVER_READINESS_PATH: z._default(
    z.templateLiteral(["/", z.string()]),
    "/ready",
  ),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_ENABLED: z._default(z.stringbool(), true),
  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  REQUEST_ID_FALLBACK_TO_TRACEPARENT: z._default(z.stringbool(), false),

  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  REDIS_URL: z._default(z.string(), "redis://localhost:6379"),
  REDIS_KEY_PREFIX: z._default(z.string(), ""),

  MYSQL_HOST: z._default(z.string(), "127.0.0.1"),
  MYSQL_PORT: z._default(z.coerce.number(), 3306),
  MYSQL_USER: z._default(z.string(), "root"),
  MYSQL_PASSWORD: z._default(z.string(), ""),
  MYSQL_DATABASE: z._default(z.string(), "temporary"),
  MYSQL_CONNECTION_LIMIT: z._default(z.coerce.number(), 10),

  USERS_CACHE_KEY: z._default(z.string().check(z.minLength(1)), "users"),
  USERS_CACHE_READ_TTL_MS: z._default(
    z.coerce.number().check(z.positive()),
    120_000,
  ),
  USERS_CACHE_REFRESH_TTL_MS: z._default(
    z.coerce.number().check(z.positive()),
    300_000,
  ),
  USERS_CACHE_FILL_FAILURE: z._default(z.enum(["fail", "serve"]), "fail"),

  OPERATION_TIMEOUT_MS: z._default(
    z.coerce.number().check(z.positive()),
    2_000,
  ),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    startupTimeoutMs: Milliseconds
    shutdownTimeoutMs: Milliseconds
    livenessPath: `/${string}`
    readinessPath: `/${string}`
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    enabled: boolean
    header: string
    fallbackToTraceparent: boolean
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  redis: {
    url: string
    keyPrefix: string
  }

  mysql: {
    host: string
    port: number
    user: string
    password: string
    database: string
    connectionLimit: number
  }

  users: {
    cache: {
      key: string
      readTtlMs: Milliseconds
      refreshTtlMs: Milliseconds
      fillFailure: CacheFillFailurePolicy
    }
  }

  operationTimeoutMs: Milliseconds
}
