import { EnvSource } from "../env-source"

describe("EnvSource", () => {
  it("returns every variable when no prefix is set", async () => {
    const source = new EnvSource({
      env: { MYSQL_HOST: "db", SERVER_PORT: "8080" },
    })

    await expect(source.load()).resolves.toEqual({
      MYSQL_HOST: "db",
      SERVER_PORT: "8080",
    })
  })

  it("keeps only prefixed variables and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "USERCACHE_",
      env: { USERCACHE_SERVER_PORT: "9000", PATH: "/usr/bin" },
    })

    await expect(source.load()).resolves.toEqual({ SERVER_PORT: "9000" })
  })

  it("reads process.env by default", async () => {
    vi.stubEnv("USERCACHE_PROBE", "on")

    try {
      const values = await new EnvSource({ prefix: "USERCACHE_" }).load()

      expect(values.PROBE).toBe("on")
    } finally {
      vi.unstubAllEnvs()
    }
  })
})
