import { FakeClock } from "../fake-clock"

describe("FakeClock behavior", () => {
  it("starts at the provided time and defaults to 0", () => {
    expect(new FakeClock(1000).nowMs()).toBe(1000)
    expect(new FakeClock().nowMs()).toBe(0)
  })

  it("advance() and set() move virtual time", () => {
    const clock = new FakeClock()

    clock.advance(100)
    expect(clock.nowMs()).toBe(100)

    clock.set(500)
    expect(clock.now()).toEqual(new Date(500))
  })

  it("sleep() records the duration and advances time by it", async () => {
    const clock = new FakeClock(10)

    await clock.sleep(1000)
    await clock.sleep(2000)

    expect(clock.sleeps).toStrictEqual([1000, 2000])
    expect(clock.nowMs()).toBe(3010)
  })

  it("sleep() with an aborted signal neither records nor advances", async () => {
    const clock = new FakeClock()
    const ac = new AbortController()
    ac.abort()

    await clock.sleep(1000, ac.signal)

    expect(clock.sleeps).toStrictEqual([])
    expect(clock.nowMs()).toBe(0)
  })
})
