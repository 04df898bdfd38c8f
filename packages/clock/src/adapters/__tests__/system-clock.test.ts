import { SystemClock } from "../system-clock"

describe("SystemClock", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("reads the system time", () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-03-01T12:00:00.000Z"))

    const clock = new SystemClock()

    expect(clock.nowMs()).toBe(Date.parse("2024-03-01T12:00:00.000Z"))
    expect(clock.now()).toEqual(new Date("2024-03-01T12:00:00.000Z"))
  })
})
