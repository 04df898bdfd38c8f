import type { Clock, UnixMs } from "@usercache/clock"
import type { Logger } from "@usercache/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: readonly LifecycleHook[]
}

export type StopResult = {
  /** No failures and no timeout. */
  ok: boolean

  failures: HookFailure[]

  /**
   * The deadline passed before everything ran, so the listener close or some
   * hooks were abandoned. Open sockets are not force-killed.
   */
  timedOut: boolean
}

/**
 * Closes the listener first, then runs every stop hook even after a failure.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const { failures, timedOut } = await runHooks(
    {
      phase: "shutdown",
      clock: ctx.clock,
      logger: ctx.logger,
      deadlineMs: ctx.deadlineMs,
    },
    [closeServerHook(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete", {
    failureCount: failures.length,
    timedOut,
  })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: async ({ signal }) => {
      const res = await closeUntilAborted(server, signal)

      if (res.kind === "failed") throw res.error
    },
  }
}

type CloseOutcome = { kind: "closed" } | {
  kind: "aborted",
} | { kind: "failed"; error: Error }

function closeUntilAborted(
  server: Closeable,
  signal: AbortSignal,
): Promise<CloseOutcome> {
  if (signal.aborted) return Promise.resolve({ kind: "aborted" })

  return new Promise((resolve) => {
    const onAbort = () => resolve({ kind: "aborted" })

    signal.addEventListener("abort", onAbort, { once: true })

    server.close((err) => {
      signal.removeEventListener("abort", onAbort)
      resolve(err ? { kind: "failed", error: err } : { kind: "closed" })
    })
  })
}
