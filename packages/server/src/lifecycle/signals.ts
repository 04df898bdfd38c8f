import type { Logger } from "@usercache/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** Hard exit budget after a fatal error. @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
}

export interface SignalHandler {
  unregister: () => void
}

/**
 * SIGINT and SIGTERM stop the server gracefully. An uncaught exception or
 * unhandled rejection stops it, then exits with code 1; a second fatal error
 * during that stop exits immediately.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  const exit = ctx.exit ?? ((code: number) => process.exit(code))

  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      exit(1)
      return
    }

    stopping = true
    ctx.logger.fatal("Fatal error", { reason, err })

    void stopThenExit(ctx, exit, fatalTimeoutMs, reason)
  }

  const sigint = () => onSignal("SIGINT")
  const sigterm = () => onSignal("SIGTERM")
  const uncaught = (err: Error) => onFatal("uncaughtException", err)
  const rejection = (reason: unknown) => onFatal("unhandledRejection", reason)

  process.on("SIGINT", sigint)
  process.on("SIGTERM", sigterm)
  process.on("uncaughtException", uncaught)
  process.on("unhandledRejection", rejection)

  return {
    unregister: () => {
      process.off("SIGINT", sigint)
      process.off("SIGTERM", sigterm)
      process.off("uncaughtException", uncaught)
      process.off("unhandledRejection", rejection)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function stopThenExit(
  ctx: SignalHandlerContext,
  exit: (code: number) => void,
  timeoutMs: number,
  reason: string,
): Promise<void> {
  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs })
    exit(1)
  }, timeoutMs)

  timer.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(timer)
  }

  exit(1)
}

async function runStop(
  ctx: SignalHandlerContext,
  reason: string,
): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
