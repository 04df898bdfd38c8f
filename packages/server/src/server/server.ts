import {
  type Handler,
  Hono,
  type Context as HonoContext,
  type MiddlewareHandler,
} from "hono"
import {
  type CreateErrorHandlerFn,
  createErrorHandler,
} from "../errors/create-error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import {
  type CreateStopperFn,
  createStopper,
  type ServerHandle,
} from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import {
  type ShutdownFn,
  type StopResult,
  shutdown,
} from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { StartupError, type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type Application = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler
export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export function createApp(): Application {
  return new Hono()
}

/**
 * Owns one Hono app and its lifecycle.
 *
 * `build()` wires routes and middleware without listening, which is what
 * tests use through `app.request()`. `start()` runs the start hooks, builds,
 * then listens; it throws a {@link StartupError} and never listens when a
 * hook fails or the startup deadline passes.
 */
export class Server {
  readonly app: Application

  private state: ServerState = "idle"
  private ready = false
  private built = false
  private runningServer?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {
    this.app = options.createApp ? options.createApp() : createApp()
  }

  build(): Application {
    if (this.built) return this.app

    this.collabs.buildApp({
      app: this.app,
      options: this.options,
      isReady: () => this.ready,
      errorHandler: this.collabs.createErrorHandler(
        this.options.errorHandling,
        this.deps.logger,
      ),
      defaultMiddleware: this.collabs.createDefaultMiddleware(
        this.options,
        this.deps.logger,
      ),
    })

    this.built = true

    return this.app
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.runningServer?.stop() ?? this.noopStop(),
    })

    return this
  }

  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") {
      throw new Error("Server already started")
    }

    this.state = "starting"

    try {
      const result = await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!result.ok) throw new StartupError(result)

      const server = this.collabs.listen(
        this.build(),
        this.options,
        this.deps.logger,
      )

      const handle = this.collabs.createStopper({
        server,
        deps: this.deps,
        options: this.options,
        setReady: (value) => {
          this.ready = value
        },
        shutdown: this.collabs.onShutdown,
        onStop: () => this.signalHandler?.unregister(),
      })

      this.runningServer = handle
      this.ready = true
      this.state = "started"

      return handle
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }

  private noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(
  deps: ServerDependencies,
  options: ServerOptions,
  collabs?: ServerCollaborators,
): Server {
  return new Server(deps, resolveOptions(options), collabs)
}
