import type { Clock, Milliseconds, UnixMs } from "@usercache/clock"
import type { Logger } from "@usercache/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop at the first failure. Startup runs this way. */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

type HookAttempt = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks in order against one shared deadline. Each hook gets an abort
 * signal armed with the time left; once the deadline passes, the remaining
 * hooks are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runOneHook(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)
      if (policy.failFast) return { failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runOneHook(
  ctx: RunHooksContext,
  hook: LifecycleHook,
): Promise<HookAttempt> {
  const msLeft = timeLeftMs(ctx)

  if (msLeft <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks after deadline`, {
      hook: hook.name,
    })
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), msLeft)

  try {
    // A hook that ignores its signal is abandoned once the deadline passes.
    await Promise.race([
      hook.fn({ signal: controller.signal, timeRemainingMs: msLeft }),
      untilAborted(controller.signal),
    ])

    if (pastDeadline(ctx, controller)) {
      ctx.logger.warn(
        `${title(ctx.phase)} deadline exceeded during hook: ${hook.name}`,
      )
      return { timedOut: true }
    }

    ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)

    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${title(ctx.phase)} hook failed: ${hook.name}`, { err })

    return {
      failure: { hook: hook.name, error: err },
      timedOut: pastDeadline(ctx, controller),
    }
  } finally {
    clearTimeout(timer)
  }
}

function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true })
  })
}

function pastDeadline(
  ctx: RunHooksContext,
  controller: AbortController,
): boolean {
  return controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs
}

function timeLeftMs(ctx: RunHooksContext): Milliseconds {
  return Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())
}

function title(phase: HookPhase): string {
  return phase === "startup" ? "Startup" : "Shutdown"
}
