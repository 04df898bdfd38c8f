export {
  createErrorFormatter,
  createErrorHandler,
  type ErrorHandler,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./errors"
export type { StatusCode } from "./http/status-codes"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type {
  HookFailure,
  LifecycleHook,
  LifecycleHookContext,
} from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export { StartupError, type StartResult } from "./lifecycle/startup"
export {
  type Application,
  type Context,
  createApp,
  createServer,
  type Middleware,
  type RequestHandler,
  Server,
  type ServerCollaborators,
  type ServerState,
} from "./server/server"
export type {
  ErrorHandling,
  PathString,
  ReadinessCheck,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
export { applyOverrides, type DeepPartial } from "./utils/apply-overrides"
