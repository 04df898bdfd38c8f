import { type MockProxy, mock } from "vitest-mock-extended"
import { pingRedis, type RedisStringClient } from "../redis-client"
import { RedisKeyValueCache } from "../redis-key-value-cache"

describe("RedisKeyValueCache", () => {
  let client: MockProxy<RedisStringClient>
  let cache: RedisKeyValueCache

  beforeEach(() => {
    client = mock<RedisStringClient>()
    cache = new RedisKeyValueCache(client, {
      keyspacePrefix: "usercache:test:",
    })
  })

  describe("strings", () => {
    it("maps a null reply to a miss", async () => {
      client.get.mockResolvedValue(null)

      await expect(cache.get("users")).resolves.toStrictEqual({ kind: "miss" })
      expect(client.get).toHaveBeenCalledWith("usercache:test:users")
    })

    it("maps a reply to a hit", async () => {
      client.get.mockResolvedValue("[]")

      await expect(cache.get("users")).resolves.toStrictEqual({
        kind: "hit",
        value: "[]",
      })
    })

    it("sets without expiry when no TTL is given", async () => {
      await cache.set("greeting", "hello")

      expect(client.set).toHaveBeenCalledWith(
        "usercache:test:greeting",
        "hello",
      )
    })

    it.each([
      [{ kind: "seconds", seconds: 120 } as const, { EX: 120 }],
      [
        { kind: "milliseconds", milliseconds: 300_000 } as const,
        { PX: 300_000 },
      ],
      [
        {
          kind: "until",
          expiresAt: new Date("2024-01-15T10:30:00.000Z"),
        } as const,
        { PXAT: Date.parse("2024-01-15T10:30:00.000Z") },
      ],
    ])("translates TTL %o to %o", async (ttl, expected) => {
      await cache.set("users", "[]", { ttl })

      expect(client.set).toHaveBeenCalledWith(
        "usercache:test:users",
        "[]",
        expected,
      )
    })

    it("propagates client failures", async () => {
      client.get.mockRejectedValue(new Error("ECONNREFUSED"))

      await expect(cache.get("users")).rejects.toThrow("ECONNREFUSED")
    })
  })

  describe("lists", () => {
    it("pushes to the tail and returns the new length", async () => {
      client.rPush.mockResolvedValue(3)

      await expect(cache.pushList("queue", ["a", "b"])).resolves.toBe(3)
      expect(client.rPush).toHaveBeenCalledWith("usercache:test:queue", [
        "a",
        "b",
      ])
    })

    it("reads the whole list", async () => {
      client.lRange.mockResolvedValue(["a", "b"])

      await expect(cache.rangeList("queue")).resolves.toEqual(["a", "b"])
      expect(client.lRange).toHaveBeenCalledWith("usercache:test:queue", 0, -1)
    })
  })

  describe("hashes", () => {
    it("sets a field", async () => {
      client.hSet.mockResolvedValue(1)

      await cache.setHashField("profile", "name", "ann")

      expect(client.hSet).toHaveBeenCalledWith(
        "usercache:test:profile",
        "name",
        "ann",
      )
    })

    it("maps a missing field to a miss", async () => {
      client.hGet.mockResolvedValue(null)

      await expect(
        cache.getHashField("profile", "name"),
      ).resolves.toStrictEqual({ kind: "miss" })
    })

    it("maps a present field to a hit", async () => {
      client.hGet.mockResolvedValue("ann")

      await expect(
        cache.getHashField("profile", "name"),
      ).resolves.toStrictEqual({ kind: "hit", value: "ann" })
      expect(client.hGet).toHaveBeenCalledWith("usercache:test:profile", "name")
    })
  })

  describe("pingRedis", () => {
    it("is true on PONG", async () => {
      client.ping.mockResolvedValue("PONG")

      await expect(pingRedis(client)).resolves.toBe(true)
    })

    it("is false on any other reply", async () => {
      client.ping.mockResolvedValue("LOADING")

      await expect(pingRedis(client)).resolves.toBe(false)
    })
  })
})
