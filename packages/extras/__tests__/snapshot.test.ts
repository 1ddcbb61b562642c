import { describe, it, expect, beforeEach } from "vitest"
import { z } from "zod"
import { createDigraph, createGraph, DuplicateVertexError, type Graph } from "@weavegraph/graph"
import {
  deserializeGraph,
  exportSnapshot,
  importSnapshot,
  serializeGraph,
  SnapshotError,
  stringCodec,
  zodCodec,
} from "../src"

describe("graph snapshots", () => {
  let graph: Graph<string, string>

  beforeEach(() => {
    graph = createGraph<string, string>()
    for (const element of ["A", "B", "C"]) {
      graph.insertVertex(element)
    }
    graph.insertEdge("A", "B", "AB", 2, { lanes: 2 })
    graph.insertEdge("C", "B", "CB")
  })

  it("should export vertices and edges by index", () => {
    expect(exportSnapshot(graph, stringCodec)).toEqual({
      version: 1,
      directed: false,
      vertices: ["A", "B", "C"],
      edges: [
        { element: "AB", source: 0, target: 1, weight: 2, properties: { lanes: 2 } },
        { element: "CB", source: 2, target: 1, weight: 1 },
      ],
    })
  })

  it("should rebuild an equivalent graph from JSON", () => {
    const copy = deserializeGraph(serializeGraph(graph, stringCodec), stringCodec)

    expect(copy.directed).toBe(false)
    expect(copy.vertices().map((vertex) => vertex.label)).toEqual(["A", "B", "C"])
    expect(copy.edges().map((edge) => edge.toString())).toEqual([
      "Edge{AB: A -- B, weight=2}",
      "Edge{CB: C -- B, weight=1}",
    ])
    expect(copy.getEdge("AB")?.properties).toEqual({ lanes: 2 })
    expect(copy.dijkstra("A", "C")?.distance()).toBe(3)
  })

  it("should keep direction", () => {
    const digraph = createDigraph<string, string>()
    digraph.insertVertex("A")
    digraph.insertVertex("B")
    digraph.insertEdge("A", "B", "AB")

    const copy = importSnapshot(exportSnapshot(digraph, stringCodec), stringCodec)

    expect(copy.directed).toBe(true)
    expect(copy.areAdjacent("A", "B")).toBe(true)
    expect(copy.areAdjacent("B", "A")).toBe(false)
  })

  it("should reject malformed snapshots", () => {
    const snapshot = { ...exportSnapshot(graph, stringCodec), version: 2 }

    try {
      importSnapshot(snapshot, stringCodec)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(SnapshotError)
      if (error instanceof SnapshotError) {
        expect(error.issues[0]?.path).toBe("version")
      }
    }
  })

  it("should reject edges pointing past the vertex list", () => {
    const snapshot = {
      version: 1,
      directed: false,
      vertices: ["A"],
      edges: [{ element: "AX", source: 0, target: 5, weight: 1 }],
    }

    expect(() => importSnapshot(snapshot, stringCodec)).toThrow("Edge 0 refers to a missing vertex")
  })

  it("should wrap graph errors", () => {
    const snapshot = { version: 1, directed: false, vertices: ["A", "A"], edges: [] }

    try {
      importSnapshot(snapshot, stringCodec)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(SnapshotError)
      if (error instanceof SnapshotError) {
        expect(error.message).toBe("Snapshot describes an invalid graph: There's already a vertex with this element: A")
        expect(error.cause).toBeInstanceOf(DuplicateVertexError)
      }
    }
  })

  it("should reject text that is not JSON", () => {
    expect(() => deserializeGraph("{", stringCodec)).toThrow("Snapshot is not valid JSON")
  })

  it("should decode elements through zod schemas", () => {
    const city = z.object({ id: z.number(), name: z.string() })
    const road = z.object({ name: z.string(), km: z.number() })
    const codec = zodCodec(city, road)
    const options = { vertexKey: (value: z.infer<typeof city>) => value.id }

    const snapshot = {
      version: 1,
      directed: false,
      vertices: [
        { id: 1, name: "Lisbon" },
        { id: 2, name: "Porto" },
      ],
      edges: [{ element: { name: "A1", km: 313 }, source: 0, target: 1, weight: 313 }],
    }
    const cities = importSnapshot(snapshot, codec, options)

    expect(cities.hasVertex({ id: 2, name: "" })).toBe(true)
    expect(cities.edges()[0]?.weight).toBe(313)

    const broken = { ...snapshot, vertices: [{ id: 1, name: 3 }] }
    expect(() => importSnapshot(broken, codec, options)).toThrow(
      "Invalid vertex element: Expected string, received number",
    )
  })
})
