import { describe, it, expect, beforeEach } from "vitest"
import { createDigraph, type Digraph } from "../src"

describe("DirectedGraph", () => {
  let digraph: Digraph<string, string>

  beforeEach(() => {
    digraph = createDigraph<string, string>()
    for (const element of ["A", "B", "C"]) {
      digraph.insertVertex(element)
    }
    digraph.insertEdge("A", "B", "AB")
    digraph.insertEdge("B", "C", "BC", 2)
    digraph.insertEdge("C", "B", "CB", 4)
  })

  it("should create directed edges from endpointA to endpointB", () => {
    const edge = digraph.getEdge("AB")

    expect(edge?.directed).toBe(true)
    expect(edge?.endpointA.label).toBe("A")
    expect(edge?.endpointB.label).toBe("B")
    expect(edge?.toString()).toBe("Edge{AB: A -> B, weight=1}")
  })

  it("should follow direction for adjacency", () => {
    expect(digraph.areAdjacent("A", "B")).toBe(true)
    expect(digraph.areAdjacent("B", "A")).toBe(false)
    expect(digraph.areAdjacent("B", "C")).toBe(true)
    expect(digraph.areAdjacent("C", "B")).toBe(true)
  })

  it("should split inbound and outbound edges", () => {
    expect(digraph.outboundEdges("B").map((edge) => edge.label)).toEqual(["BC"])
    expect(digraph.inboundEdges("B").map((edge) => edge.label)).toEqual(["AB", "CB"])
    expect(digraph.incidentEdges("B").map((edge) => edge.label)).toEqual(["AB", "CB"])
    expect(digraph.outboundEdges("C").map((edge) => edge.label)).toEqual(["CB"])
    expect(digraph.inboundEdges("A")).toEqual([])
  })

  it("should only find edges in their direction", () => {
    expect(digraph.edge("A", "B")?.element).toBe("AB")
    expect(digraph.edge("B", "A")).toBeUndefined()
    expect(digraph.edge("C", "B")?.element).toBe("CB")
  })

  it("should remove edges by endpoints only in their direction", () => {
    expect(digraph.removeEdge("B", "A")).toBeUndefined()
    expect(digraph.numEdges()).toBe(3)
    expect(digraph.removeEdge("A", "B")).toBe("AB")
    expect(digraph.numEdges()).toBe(2)
  })

  it("should remove inbound and outbound edges with a vertex", () => {
    expect(digraph.removeVertex("B")).toBe("B")
    expect(digraph.numEdges()).toBe(0)
    expect(digraph.outboundEdges("A")).toEqual([])
    expect(digraph.inboundEdges("C")).toEqual([])
  })

  it("should keep direction when a vertex element is replaced", () => {
    digraph.replaceVertex("B", "X")

    expect(digraph.outboundEdges("X").map((edge) => edge.label)).toEqual(["BC"])
    expect(digraph.inboundEdges("X").map((edge) => edge.label)).toEqual(["AB", "CB"])
    expect(digraph.areAdjacent("A", "X")).toBe(true)
    expect(digraph.areAdjacent("X", "A")).toBe(false)
    expect(digraph.getEdge("CB")?.weight).toBe(4)
  })

  it("should describe itself as a digraph", () => {
    expect(digraph.toString().split("\n")[0]).toBe("Digraph with 3 vertices and 3 edges:")
    expect(digraph.stats()).toEqual({ vertices: 3, edges: 3, directed: true })
  })
})
