import { type KeyValueCache, MemoryKeyValueCache } from "@usercache/cache"
import { FakeClock } from "@usercache/clock"
import { mock } from "vitest-mock-extended"
import { KeyValueError } from "../../model/kv.errors"
import { KeyValuePassthrough } from "../key-value-passthrough"

describe("KeyValuePassthrough", () => {
  let clock: FakeClock
  let cache: MemoryKeyValueCache
  let kv: KeyValuePassthrough

  beforeEach(() => {
    clock = new FakeClock(Date.parse("2024-01-15T10:30:00Z"))
    cache = new MemoryKeyValueCache({ clock }, { maxEntries: 100 })
    kv = new KeyValuePassthrough({ cache }, { operationTimeoutMs: 1_000 })
  })

  describe("strings", () => {
    it("stores a value that never expires", async () => {
      await kv.setString("greeting", "hello")
      clock.advance(365 * 24 * 60 * 60 * 1000)

      await expect(kv.getString("greeting")).resolves.toBe("hello")
    })

    it("overwrites an existing value", async () => {
      await kv.setString("greeting", "hello")
      await kv.setString("greeting", "hi")

      await expect(kv.getString("greeting")).resolves.toBe("hi")
    })

    it("reports a missing key as not found", async () => {
      await expect(kv.getString("absent")).rejects.toMatchObject({
        code: "cache_key_not_found",
        message: "Key not found: absent",
      })
    })

    it.each([
      [undefined, "hello"],
      ["greeting", undefined],
      ["", "hello"],
      ["greeting", ""],
    ])("requires key and value (%j, %j)", async (key, value) => {
      const set = vi.spyOn(cache, "set")

      await expect(kv.setString(key, value)).rejects.toMatchObject({
        code: "missing_parameters",
        message: "Missing key or value parameters",
      })
      expect(set).not.toHaveBeenCalled()
    })

    it("requires a key to read", async () => {
      await expect(kv.getString(undefined)).rejects.toThrow(
        "Missing key parameter",
      )
    })
  })

  describe("lists", () => {
    it("appends instead of replacing", async () => {
      await expect(kv.pushList("colors", ["red", "green"])).resolves.toBe(2)
      await expect(kv.pushList("colors", ["blue"])).resolves.toBe(3)

      await expect(kv.rangeList("colors")).resolves.toEqual([
        "red",
        "green",
        "blue",
      ])
    })

    it("reads a missing list as empty", async () => {
      await expect(kv.rangeList("absent")).resolves.toEqual([])
    })

    it("requires at least one value", async () => {
      await expect(kv.pushList("colors", [])).rejects.toMatchObject({
        code: "missing_parameters",
        message: "Missing key or value parameters",
      })
    })

    it("requires a key to read", async () => {
      await expect(kv.rangeList("")).rejects.toThrow("Missing key parameter")
    })
  })

  describe("hashes", () => {
    it("sets and reads a field", async () => {
      await kv.setHashField("user:1", "name", "ann")
      await kv.setHashField("user:1", "email", "a@x.com")

      await expect(kv.getHashField("user:1", "name")).resolves.toBe("ann")
      await expect(kv.getHashField("user:1", "email")).resolves.toBe("a@x.com")
    })

    it("reports a missing field as not found", async () => {
      await kv.setHashField("user:1", "name", "ann")

      await expect(kv.getHashField("user:1", "age")).rejects.toMatchObject({
        code: "cache_field_not_found",
        message: "Field age not found in key user:1",
      })
    })

    it("reports a field of a missing key as not found", async () => {
      await expect(kv.getHashField("absent", "name")).rejects.toBeInstanceOf(
        KeyValueError,
      )
    })

    it("requires key, field and value to write", async () => {
      await expect(kv.setHashField("user:1", undefined, "ann")).rejects.toThrow(
        "Missing key, field, or value parameters",
      )
    })

    it("requires key and field to read", async () => {
      await expect(kv.getHashField("user:1", "")).rejects.toThrow(
        "Missing key or field parameter",
      )
    })
  })

  it("times out a cache call that does not answer", async () => {
    const hanging = mock<KeyValueCache>()
    hanging.rangeList.mockReturnValue(new Promise(() => {}))
    const slow = new KeyValuePassthrough(
      { cache: hanging },
      { operationTimeoutMs: 20 },
    )

    await expect(slow.rangeList("colors")).rejects.toMatchObject({
      code: "operation_timeout",
      context: { operation: "cache.rangeList" },
    })
  })

  it("propagates cache errors", async () => {
    const broken = mock<KeyValueCache>()
    broken.get.mockRejectedValue(new Error("WRONGTYPE"))
    const failing = new KeyValuePassthrough(
      { cache: broken },
      { operationTimeoutMs: 1_000 },
    )

    await expect(failing.getString("colors")).rejects.toThrow("WRONGTYPE")
  })
})
