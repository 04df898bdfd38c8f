import { Hono } from "hono"
import { DEFAULTS, type ReadinessCheck } from "../../server/server-options"
import { registerHealthRoutes } from "../health"

describe("registerHealthRoutes", () => {
  function appWith(readinessChecks: ReadinessCheck[], ready = true) {
    const app = new Hono()

    registerHealthRoutes(
      app,
      { ...DEFAULTS.health, readinessChecks },
      () => ready,
    )

    return app
  }

  it("answers liveness without caching", async () => {
    const res = await appWith([]).request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ ok: true })
    expect(res.headers.get("cache-control")).toBe(
      "no-store, no-cache, must-revalidate",
    )
  })

  it("is not ready while the server is starting", async () => {
    const res = await appWith([], false).request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toEqual({ ok: false, reason: "starting" })
  })

  it("is ready when every check passes", async () => {
    const res = await appWith([
      { name: "redis", fn: async () => true },
      { name: "mysql", fn: async () => true },
    ]).request("/ready")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ ok: true })
  })

  it("reports the first failing check and skips the rest", async () => {
    const mysql = vi.fn(async () => true)

    const res = await appWith([
      { name: "redis", fn: async () => false },
      { name: "mysql", fn: mysql },
    ]).request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toEqual({ ok: false, reason: "redis" })
    expect(mysql).not.toHaveBeenCalled()
  })

  it("reports a throwing check as an error", async () => {
    const res = await appWith([
      {
        name: "mysql",
        fn: async () => {
          throw new Error("ECONNREFUSED")
        },
      },
    ]).request("/ready")

    expect(await res.json()).toEqual({ ok: false, reason: "mysql:error" })
  })

  it("reports a check that outlives its timeout", async () => {
    const res = await appWith([
      {
        name: "redis",
        timeoutMs: 10,
        fn: () => new Promise<boolean>(() => {}),
      },
    ]).request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toEqual({ ok: false, reason: "redis:timeout" })
  })

  it("registers nothing when disabled", async () => {
    const app = new Hono()

    registerHealthRoutes(app, { enabled: false }, () => true)

    expect((await app.request("/health")).status).toBe(404)
  })
})
