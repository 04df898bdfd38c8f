import { FifoMemoryMap } from "../fifo-memory-map"

describe("FifoMemoryMap", () => {
  it("has no victim when empty", () => {
    expect(new FifoMemoryMap<string, number>().victim()).toBeUndefined()
  })

  it("nominates the oldest inserted key", () => {
    const map = new FifoMemoryMap<string, number>()
    map.set("a", 1)
    map.set("b", 2)

    expect(map.victim()).toBe("a")
  })

  it("keeps the original position when a key is overwritten", () => {
    const map = new FifoMemoryMap<string, number>()
    map.set("a", 1)
    map.set("b", 2)
    map.set("a", 3)

    expect(map.get("a")).toBe(3)
    expect(map.victim()).toBe("a")
  })

  it("does not reorder on reads", () => {
    const map = new FifoMemoryMap<string, number>()
    map.set("a", 1)
    map.set("b", 2)
    map.get("a")

    expect(map.victim()).toBe("a")
  })

  it("moves on after a delete", () => {
    const map = new FifoMemoryMap<string, number>()
    map.set("a", 1)
    map.set("b", 2)

    expect(map.delete("a")).toBe(true)
    expect(map.has("a")).toBe(false)
    expect(map.size()).toBe(1)
    expect(map.victim()).toBe("b")
  })
})
