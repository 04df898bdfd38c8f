import type { RedisStringClient } from "@usercache/cache"
import { NullLogger } from "@usercache/logger"
import { StartupError } from "@usercache/server"
import { mock } from "vitest-mock-extended"
import { createAppContext } from "../../app/create-context"
import { createTestHarness } from "../../tests/test-harness"
import { buildServer, errorMappings } from "../build-server"

describe("buildServer", () => {
  it("registers the start and stop hooks in order", async () => {
    const { ctx } = await createTestHarness()

    const { startHooks, stopHooks } = buildServer(ctx)

    expect(
      startHooks.map((h) => h.name),
    ).toEqual(["start:redis", "start:mysql:schema"])
    expect(stopHooks.map((h) => h.name)).toEqual(["stop:redis", "stop:mysql"])
  })

  it("answers liveness without touching Redis or MySQL", async () => {
    const { app } = await createTestHarness()

    const res = await app.request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ ok: true })
  })

  it("reports not ready before the server has started", async () => {
    const { app } = await createTestHarness()

    const res = await app.request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toEqual({ ok: false, reason: "starting" })
  })

  it("serves health on configured paths", async () => {
    const { app } = await createTestHarness({
      env: { NODE_ENV: "test", SERVER_LIVENESS_PATH: "/livez" },
    })

    expect((await app.request("/livez")).status).toBe(200)
    expect((await app.request("/health")).status).toBe(404)
  })

  it("echoes the request id header", async () => {
    const { app } = await createTestHarness()

    const res = await app.request("/users", {
      headers: { "x-request-id": "req-42" },
    })

    expect(res.headers.get("x-request-id")).toBe("req-42")
  })

  it("maps client error codes to 400 and 404 and leaves the rest to the fallback", () => {
    expect(errorMappings.mappings).toEqual({
      validation_error: { status: 400 },
      invalid_json_body: { status: 400 },
      missing_required_field: { status: 400 },
      missing_parameters: { status: 400 },
      cache_key_not_found: { status: 404 },
      cache_field_not_found: { status: 404 },
    })
    expect(errorMappings.fallback).toBeUndefined()
  })

  it("refuses to start when redis never connects before the deadline", async () => {
    const redisClient = mock<RedisStringClient>({ isOpen: false })
    redisClient.connect.mockReturnValue(new Promise(() => {}))
    const connectMySqlServer = vi.fn()

    const ctx = await createAppContext({
      env: { NODE_ENV: "test" },
      configOverrides: { server: { startupTimeoutMs: 50 } },
      coreOverrides: { logger: new NullLogger() },
      infraOverrides: { redisClient, connectMySqlServer },
    })

    const { server } = buildServer(ctx)

    const err = await server.start().catch((e: unknown) => e)

    expect(err).toBeInstanceOf(StartupError)
    expect(err).toMatchObject({
      message: "Server startup aborted: startup deadline exceeded",
    })
    expect(server.getState()).toBe("idle")
    expect(connectMySqlServer).not.toHaveBeenCalled()
  })
})
