import { fileURLToPath } from "node:url"
import { ConfigError } from "@usercache/config"
import { loadAppConfig } from "../load-app-config"

const fixtureDir = fileURLToPath(new URL(".", import.meta.url))

describe("loadAppConfig", () => {
  it("applies defaults to an empty environment", async () => {
    const config = await loadAppConfig(
      { NODE_ENV: "test" },
      undefined,
      fixtureDir,
    )

    expect(config.server).toEqual({
      host: "0.0.0.0",
      port: 8080,
      startupTimeoutMs: 30_000,
      shutdownTimeoutMs: 10_000,
      livenessPath: "/health",
      readinessPath: "/ready",
    })
    expect(config.mysql).toEqual({
      host: "127.0.0.1",
      port: 3306,
      user: "root",
      password: "",
      database: "temporary",
      connectionLimit: 10,
    })
    expect(config.users.cache).toEqual({
      key: "users",
      readTtlMs: 120_000,
      refreshTtlMs: 300_000,
      fillFailure: "fail",
    })
    expect(config.operationTimeoutMs).toBe(2_000)
  })

  it("coerces numbers and booleans from strings", async () => {
    const config = await loadAppConfig(
      {
        NODE_ENV: "test",
        MYSQL_PORT: "3307",
        LOG_PRETTY: "true",
        REQUEST_ID_ENABLED: "false",
      },
      undefined,
      fixtureDir,
    )

    expect(config.mysql.port).toBe(3307)
    expect(config.logging.prettify).toBe(true)
    expect(config.requestId.enabled).toBe(false)
  })

  it("reads the dotenv file for NODE_ENV and lets the environment win", async () => {
    const config = await loadAppConfig(
      { NODE_ENV: "fixture", SERVER_PORT: "7070" },
      undefined,
      fixtureDir,
    )

    expect(config.users.cache.key).toBe("users:fixture")
    expect(config.server.port).toBe(7070)
  })

  it("deep-merges overrides", async () => {
    const config = await loadAppConfig(
      { NODE_ENV: "test" },
      { users: { cache: { fillFailure: "serve" } } },
      fixtureDir,
    )

    expect(config.users.cache).toEqual({
      key: "users",
      readTtlMs: 120_000,
      refreshTtlMs: 300_000,
      fillFailure: "serve",
    })
  })

  it("rejects an unknown fill failure policy", async () => {
    await expect(
      loadAppConfig(
        { NODE_ENV: "test", USERS_CACHE_FILL_FAILURE: "retry" },
        undefined,
        fixtureDir,
      ),
    ).rejects.toBeInstanceOf(ConfigError)
  })

  it("rejects a non-positive operation timeout", async () => {
    await expect(
      loadAppConfig(
        { NODE_ENV: "test", OPERATION_TIMEOUT_MS: "0" },
        undefined,
        fixtureDir,
      ),
    ).rejects.toThrow(/Configuration validation failed/)
  })
})
