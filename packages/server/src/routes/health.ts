import type { Milliseconds } from "@usercache/clock"
import type { Application } from "../server/server"
import type {
  ReadinessCheck,
  ResolvedHealthConfig,
} from "../server/server-options"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

type CheckOutcome = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(
    config.livenessPath,
    (c) => c.json({ ok: true }, 200, NO_CACHE_HEADERS),
  )

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) {
      return c.json({ ok: false, reason: "starting" }, 503, NO_CACHE_HEADERS)
    }

    for (const check of config.readinessChecks) {
      const outcome = await runCheckWithTimeout(
        check,
        check.timeoutMs ?? config.checkTimeoutMs,
      )

      if (!outcome.ok) {
        return c.json(
          { ok: false, reason: outcome.reason },
          503,
          NO_CACHE_HEADERS,
        )
      }
    }

    return c.json({ ok: true }, 200, NO_CACHE_HEADERS)
  })
}

/**
 * A check that throws, answers false or outlives its budget fails readiness.
 */
async function runCheckWithTimeout(
  check: ReadinessCheck,
  timeoutMs: Milliseconds,
): Promise<CheckOutcome> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined

  const timedOut = new Promise<CheckOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort()
      resolve({ ok: false, reason: `${check.name}:timeout` })
    }, timeoutMs)
  })

  const attempt = check.fn(controller.signal).then(
    (healthy): CheckOutcome =>
      healthy ? { ok: true } : { ok: false, reason: check.name },
    (): CheckOutcome => ({ ok: false, reason: `${check.name}:error` }),
  )

  try {
    return await Promise.race([attempt, timedOut])
  } finally {
    clearTimeout(timer)
  }
}
