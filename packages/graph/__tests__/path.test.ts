import { describe, it, expect, beforeEach } from "vitest"
import {
  Path,
  createDigraph,
  createGraph,
  InvalidTraversalError,
  InvalidVertexError,
  type Edge,
  type Graph,
} from "../src"

function required<T>(value: T | undefined): T {
  if (value === undefined) throw new Error("expected a value")
  return value
}

describe("Path", () => {
  let graph: Graph<string, string>
  let ab: Edge<string, string>
  let bc: Edge<string, string>
  let cd: Edge<string, string>

  beforeEach(() => {
    graph = createGraph<string, string>()
    for (const element of ["A", "B", "C", "D"]) {
      graph.insertVertex(element)
    }
    ab = graph.insertEdge("A", "B", "AB", 1.5)
    bc = graph.insertEdge("B", "C", "BC", 2)
    cd = graph.insertEdge("C", "D", "CD", 0.5)
  })

  it("should start with a single vertex", () => {
    const path = graph.pathFrom("A")

    expect(path.length).toBe(0)
    expect(path.distance()).toBe(0)
    expect(path.origin().label).toBe("A")
    expect(path.tail().label).toBe("A")
    expect(path.edges()).toEqual([])
    expect(path.toString()).toBe("Path[A]")
  })

  it("should not start from a vertex the graph does not hold", () => {
    const foreign = createGraph<string, string>().insertVertex("A")

    expect(() => graph.pathFrom("Z")).toThrow(InvalidVertexError)
    expect(() => Path.startFrom(graph, foreign)).toThrow("Vertex does not exist! vertex=A")
  })

  it("should extend without changing the starting path", () => {
    const start = graph.pathFrom("A")
    const one = start.walk(ab)
    const two = one.walk(bc)

    expect(start.length).toBe(0)
    expect(one.length).toBe(1)
    expect(two.length).toBe(2)
    expect(two.distance()).toBe(3.5)
    expect(two.origin().label).toBe("A")
    expect(two.tail().label).toBe("C")
    expect(two.toString()).toBe("Path[A -> B -> C]")
    expect(two.edges().map((edge) => edge.label)).toEqual(["AB", "BC"])
  })

  it("should fork into independent paths", () => {
    graph.insertVertex("E")
    const be = graph.insertEdge("B", "E", "BE", 4)
    const base = graph.pathFrom("A").walk(ab)

    const toC = base.walk(bc)
    const toE = base.walk(be)

    expect(toC.toString()).toBe("Path[A -> B -> C]")
    expect(toE.toString()).toBe("Path[A -> B -> E]")
    expect(base.toString()).toBe("Path[A -> B]")
  })

  it("should walk undirected edges against their stored order", () => {
    const path = graph.pathFrom("D").walk(cd).walk(bc).walk(ab)

    expect(path.toString()).toBe("Path[D -> C -> B -> A]")
    expect(path.distance()).toBe(4)
  })

  it("should return copies of its sequences", () => {
    const path = graph.pathFrom("A").walk(ab)
    const vertices = path.vertices()
    vertices.pop()

    expect(path.vertices().map((vertex) => vertex.label)).toEqual(["A", "B"])
  })

  it("should reject an edge that does not touch the tail", () => {
    const path = graph.pathFrom("A")

    expect(() => path.walk(cd)).toThrow(InvalidTraversalError)
    expect(() => path.walk(cd)).toThrow("Cannot walk edge CD from A")
  })

  it("should reject an edge from another graph", () => {
    const other = createGraph<string, string>()
    other.insertVertex("A")
    other.insertVertex("B")
    const foreign = other.insertEdge("A", "B", "AB")

    expect(() => graph.pathFrom("A").walk(foreign)).toThrow(InvalidTraversalError)
  })

  it("should walk directed edges only from source to target", () => {
    const digraph = createDigraph<string, string>()
    digraph.insertVertex("A")
    digraph.insertVertex("B")
    const edge = digraph.insertEdge("A", "B", "AB")

    expect(digraph.pathFrom("A").walk(edge).toString()).toBe("Path[A -> B]")
    expect(() => digraph.pathFrom("B").walk(edge)).toThrow("Cannot walk edge AB from B")
  })

  it("should report membership of vertices and edges", () => {
    const path = graph.pathFrom("A").walk(ab)

    expect(path.contains(required(graph.vertex("B")))).toBe(true)
    expect(path.contains(required(graph.vertex("C")))).toBe(false)
    expect(path.contains(ab)).toBe(true)
    expect(path.contains(bc)).toBe(false)
    expect(path.endsWith(required(graph.vertex("B")))).toBe(true)
  })

  it("should list vertices one hop from the tail", () => {
    const path = graph.pathFrom("A").walk(ab)

    expect(Array.from(path.accessibleVertices(), (vertex) => vertex.label)).toEqual(["A", "C"])
  })

  it("should list the tail itself for a self-loop", () => {
    graph.insertEdge("A", "A", "AA")

    expect(Array.from(graph.pathFrom("A").accessibleVertices(), (vertex) => vertex.label)).toEqual(["B", "A"])
    expect(graph.dijkstra("A", "B")?.toString()).toBe("Path[A -> B]")
  })

  it("should only list outbound neighbours in a digraph", () => {
    const digraph = createDigraph<string, string>()
    for (const element of ["A", "B", "C"]) {
      digraph.insertVertex(element)
    }
    digraph.insertEdge("A", "B", "AB")
    digraph.insertEdge("C", "A", "CA")

    expect(Array.from(digraph.pathFrom("A").accessibleVertices(), (vertex) => vertex.label)).toEqual(["B"])
  })

  it("should compare paths element-wise", () => {
    const first = graph.pathFrom("A").walk(ab).walk(bc)
    const second = graph.pathFrom("A").walk(ab).walk(bc)

    expect(first.equals(second)).toBe(true)
    expect(first.equals(graph.pathFrom("A").walk(ab))).toBe(false)
    expect(first.equals("Path[A -> B -> C]")).toBe(false)
  })
})
