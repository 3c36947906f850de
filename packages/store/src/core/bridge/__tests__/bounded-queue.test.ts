import { tick } from "../../../tests/utils/tick"
import { BoundedQueue } from "../bounded-queue"

describe("BoundedQueue", () => {
  it.each([0, -1, 1.5])("rejects capacity %s", (capacity) => {
    expect(() => new BoundedQueue(capacity)).toThrow(RangeError)
  })

  it("hands items over in FIFO order", async () => {
    const queue = new BoundedQueue<string>(3)

    await queue.put("a")
    await queue.put("b")

    expect(await queue.take()).toBe("a")
    expect(await queue.take()).toBe("b")
    expect(queue.size).toBe(0)
  })

  it("put waits while the queue is full", async () => {
    const queue = new BoundedQueue<number>(2)
    await queue.put(1)
    await queue.put(2)

    let accepted: boolean | undefined
    const pending = queue.put(3).then((result) => {
      accepted = result
    })

    await tick()
    expect(accepted).toBeUndefined()

    expect(await queue.take()).toBe(1)
    await pending

    expect(accepted).toBe(true)
    expect(queue.size).toBe(2)
  })

  it("take waits until an item arrives", async () => {
    const queue = new BoundedQueue<number>(1)
    const pending = queue.take()

    await tick()
    await queue.put(7)

    expect(await pending).toBe(7)
  })

  it("close releases a waiting consumer with undefined", async () => {
    const queue = new BoundedQueue<number>(1)
    const pending = queue.take()

    await tick()
    queue.close()

    expect(await pending).toBeUndefined()
  })

  it("close releases a waiting producer with false and drops queued items", async () => {
    const queue = new BoundedQueue<number>(1)
    await queue.put(1)
    const pending = queue.put(2)

    await tick()
    queue.close()

    expect(await pending).toBe(false)
    expect(queue.size).toBe(0)
    expect(queue.isClosed).toBe(true)
  })

  it("rejects work after close without waiting", async () => {
    const queue = new BoundedQueue<number>(1)
    queue.close()
    queue.close()

    expect(await queue.put(1)).toBe(false)
    expect(await queue.take()).toBeUndefined()
  })
})
