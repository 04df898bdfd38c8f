import type { Clock, UnixMs } from "@usercache/clock"
import { BaseError } from "@usercache/errors"
import type { Logger } from "@usercache/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export type StartupContext = {
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  startHooks: readonly LifecycleHook[]
}

export type StartResult = {
  ok: boolean
  failures: HookFailure[]
  timedOut: boolean
}

export async function startup(ctx: StartupContext): Promise<StartResult> {
  ctx.logger.debug("Running startup hooks...")

  const { failures, timedOut } = await runHooks(
    {
      phase: "startup",
      clock: ctx.clock,
      logger: ctx.logger,
      deadlineMs: ctx.deadlineMs,
    },
    ctx.startHooks,
    { failFast: true },
  )

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type StartupFn = typeof startup

/**
 * Thrown by `Server.start()` when a start hook fails or the deadline passes.
 */
export class StartupError extends BaseError<"startup_failed"> {
  constructor(result: StartResult) {
    const failed = result.failures.map((f) => f.hook)
    const reason = result.timedOut
      ? "startup deadline exceeded"
      : `hook failed: ${failed.join(", ")}`

    super(`Server startup aborted: ${reason}`, {
      code: "startup_failed",
      context: { failedHooks: failed, timedOut: result.timedOut },
      cause: result.failures[0]?.error,
      isOperational: true,
    })
  }
}
