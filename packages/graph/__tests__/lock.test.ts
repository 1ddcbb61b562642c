import { describe, it, expect } from "vitest"
import { AsyncMutex, ConcurrentMutationError, MutationLock, createGraph } from "../src"

describe("MutationLock", () => {
  it("should run the function and release the lock", () => {
    const lock = new MutationLock()

    expect(lock.run("insertVertex", () => 42)).toBe(42)
    expect(lock.held).toBe(false)
  })

  it("should reject re-entrant runs", () => {
    const lock = new MutationLock()

    expect(() => lock.run("insertEdge", () => lock.run("removeEdge", () => 1))).toThrow(
      new ConcurrentMutationError("removeEdge", "insertEdge"),
    )
  })

  it("should release the lock when the function throws", () => {
    const lock = new MutationLock()

    expect(() =>
      lock.run("clear", () => {
        throw new Error("boom")
      }),
    ).toThrow("boom")
    expect(lock.held).toBe(false)
  })
})

describe("AsyncMutex", () => {
  const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1))

  it("should run queued callers one at a time in order", async () => {
    const mutex = new AsyncMutex()
    const events: string[] = []

    const task = (name: string) =>
      mutex.acquire(async () => {
        events.push(`${name}:start`)
        await tick()
        events.push(`${name}:end`)
        return name
      })

    const results = await Promise.all([task("a"), task("b"), task("c")])

    expect(results).toEqual(["a", "b", "c"])
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"])
  })

  it("should pass the lock on after a failure", async () => {
    const mutex = new AsyncMutex()

    const failing = mutex.acquire(() => {
      throw new Error("first failed")
    })
    const next = mutex.acquire(() => "second")

    await expect(failing).rejects.toThrow("first failed")
    await expect(next).resolves.toBe("second")
  })

  it("should serialise read-modify-write sequences on a graph", async () => {
    const graph = createGraph<string, string>()
    graph.insertVertex("hub")

    const attach = (name: string) =>
      graph.exclusive(async () => {
        const count = graph.incidentEdges("hub").length
        await tick()
        graph.insertVertex(name)
        graph.insertEdge("hub", name, `hub-${count}`)
      })

    await Promise.all([attach("x"), attach("y"), attach("z")])

    expect(graph.edges().map((edge) => edge.label)).toEqual(["hub-0", "hub-1", "hub-2"])
  })
})
