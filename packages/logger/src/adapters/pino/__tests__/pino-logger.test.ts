import { Writable } from "node:stream"
import { PinoLogger } from "../pino-logger"

function lineSink() {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(JSON.parse(line))
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger", () => {
  it("writes JSON lines with bindings and meta", () => {
    const { lines, destination } = lineSink()

    const logger = new PinoLogger(
      { destination },
      { level: "trace" },
      { service: "users" },
    )

    logger.info("cache miss", { cacheKey: "users" })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "cache miss",
      service: "users",
      cacheKey: "users",
    })
  })

  it("drops entries below the configured level", () => {
    const { lines, destination } = lineSink()

    const logger = new PinoLogger({ destination }, { level: "warn" })

    logger.debug("noise")
    logger.info("noise")
    logger.warn("kept")

    expect(lines.map((l) => l.msg)).toStrictEqual(["kept"])
  })

  it("child() keeps the parent sink and adds bindings", () => {
    const { lines, destination } = lineSink()

    const base = new PinoLogger(
      { destination },
      { level: "info" },
      { service: "users" },
    )
    const child = base.child({ requestId: "req-1" })

    child.error("refresh failed")

    expect(lines[0]).toMatchObject({
      level: 50,
      msg: "refresh failed",
      service: "users",
      requestId: "req-1",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = lineSink()

    const logger = new PinoLogger({ destination }, { level: "info" })
    const err = new Error("query failed", { cause: new Error("ECONNRESET") })

    logger.error("store error", { err })

    expect(lines[0]).toMatchObject({
      err: {
        type: "Error",
        message: "query failed",
        cause: { type: "Error", message: "ECONNRESET" },
      },
    })
  })
})
