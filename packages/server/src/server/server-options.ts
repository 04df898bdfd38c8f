import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@usercache/clock"
import type { Logger, LogLevelName } from "@usercache/logger"
import type { ErrorHandler } from "../errors/create-error-handler"
import type { ErrorMappingsConfig } from "../errors/error-formatter"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { Application, Middleware } from "./server"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /** @default "x-request-id" */
  header?: string

  /**
   * Use the trace-id of a W3C `traceparent` header when the request id header
   * is absent.
   * @default false
   */
  fallbackToTraceparent?: boolean

  /** @default crypto.randomUUID() */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Level of the `Request completed` line. 5xx responses always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /** @default the liveness and readiness paths when health routes are on */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  /** Run in order on every readiness request; the first failure answers 503. */
  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: Milliseconds
}

export type ErrorHandling =
  | { kind: "handler"; errorHandler: ErrorHandler }
  | { kind: "mappings"; config: ErrorMappingsConfig }

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /**
   * Budget for all start hooks together.
   * @default 2_147_483_647 (no practical limit)
   */
  startupTimeoutMs?: Milliseconds

  /**
   * Budget for closing the listener and running the stop hooks.
   * @default 10_000
   */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  errorHandling: ErrorHandling

  createApp?: () => Application

  routes: (app: Application) => void

  middleware?: {
    pre?: Middleware[]
    post?: Middleware[]
  }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig =
  | DisabledConfig
  | Required<EnabledRequestIdConfig>

export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>

export type ResolvedHealthConfig =
  | DisabledConfig
  | Required<EnabledHealthConfig>

export interface ResolvedMiddleware {
  pre: Middleware[]
  post: Middleware[]
}

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorHandling: ErrorHandling

  createApp?: () => Application
  routes: (app: Application) => void
  middleware: ResolvedMiddleware
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

interface ServerDefaults {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Required<EnabledRequestIdConfig>
  requestLogging: { enabled: true; level: LogLevelName }
  health: Required<EnabledHealthConfig>
}

export const DEFAULTS: ServerDefaults = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
    fallbackToTraceparent: false,
    generate: () => randomUUID(),
  },
  requestLogging: {
    enabled: true,
    level: "info",
  },
  health: {
    enabled: true,
    livenessPath: "/health",
    readinessPath: "/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealthConfig(options)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestIdConfig(options),
    requestLogging: resolveRequestLoggingConfig(options, health),
    health,
    errorHandling: options.errorHandling,
    routes: options.routes,
    ...(options.createApp && { createApp: options.createApp }),
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealthConfig(options: ServerOptions): ResolvedHealthConfig {
  if (options.health?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.health, ...options.health, enabled: true }
}

function resolveRequestIdConfig(
  options: ServerOptions,
): ResolvedRequestIdConfig {
  if (options.requestId?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.requestId, ...options.requestId, enabled: true }
}

function resolveRequestLoggingConfig(
  options: ServerOptions,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (options.requestLogging?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: options.requestLogging?.level ?? DEFAULTS.requestLogging.level,
    ignorePaths:
      options.requestLogging?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
