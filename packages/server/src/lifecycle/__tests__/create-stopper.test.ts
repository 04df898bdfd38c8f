import { FakeClock } from "@usercache/clock"
import { NullLogger } from "@usercache/logger"
import { resolveOptions } from "../../server/server-options"
import { createStopper } from "../create-stopper"
import type { Closeable, StopResult } from "../shutdown"

describe("createStopper", () => {
  const result: StopResult = { ok: true, failures: [], timedOut: false }
  const server: Closeable = { close: (callback) => callback?.() }
  const stopHooks = [{ name: "stop:redis", fn: async () => {} }]

  function setup() {
    const clock = new FakeClock(5_000)
    const deps = { clock, logger: new NullLogger() }
    const options = resolveOptions({
      port: 8080,
      host: "127.0.0.1",
      shutdownTimeoutMs: 10_000,
      errorHandling: { kind: "mappings", config: { mappings: {} } },
      routes: () => {},
      stopHooks,
    })
    const shutdown = vi.fn(async () => result)
    const setReady = vi.fn()
    const onStop = vi.fn()

    const handle = createStopper({
      server,
      deps,
      options,
      setReady,
      shutdown,
      onStop,
    })

    return { handle, deps, shutdown, setReady, onStop }
  }

  it("exposes the bound address", () => {
    expect(setup().handle.address).toEqual({ host: "127.0.0.1", port: 8080 })
  })

  it("marks the server unready and shuts down within the budget", async () => {
    const { handle, deps, shutdown, setReady, onStop } = setup()

    await expect(handle.stop()).resolves.toBe(result)

    expect(setReady).toHaveBeenCalledWith(false)
    expect(shutdown).toHaveBeenCalledWith({
      server,
      clock: deps.clock,
      logger: deps.logger,
      deadlineMs: 15_000,
      stopHooks,
    })
    expect(onStop).toHaveBeenCalledOnce()
  })

  it("shares one shutdown between repeated calls", async () => {
    const { handle, shutdown } = setup()

    const [a, b] = await Promise.all([handle.stop(), handle.stop()])

    expect(a).toBe(b)
    expect(shutdown).toHaveBeenCalledOnce()
  })
})
