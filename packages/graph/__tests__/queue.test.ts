import { describe, it, expect } from "vitest"
import { FifoQueue } from "../src/search/queue"

describe("FifoQueue", () => {
  it("should return items in insertion order", () => {
    const queue = new FifoQueue<number>()
    queue.push(1)
    queue.push(2)

    expect(queue.shift()).toBe(1)
    queue.push(3)
    expect(queue.shift()).toBe(2)
    expect(queue.shift()).toBe(3)
    expect(queue.shift()).toBeUndefined()
    expect(queue.size).toBe(0)
  })

  it("should keep order across compaction", () => {
    const queue = new FifoQueue<number>()
    for (let i = 0; i < 3000; i++) {
      queue.push(i)
    }

    const drained: number[] = []
    for (let i = 0; i < 1500; i++) {
      const item = queue.shift()
      if (item !== undefined) drained.push(item)
    }
    queue.push(3000)

    expect(drained[1499]).toBe(1499)
    expect(queue.size).toBe(1501)
    expect(queue.shift()).toBe(1500)
  })
})
