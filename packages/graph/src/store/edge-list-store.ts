/**
 * Edge-List Store
 *
 * Owns the vertices and edges of one graph, keyed by element key, with
 * adjacency indexes for traversal. The store trusts its caller: validation
 * happens in the graph before any store call.
 */

import { rewireEdge, sameKey, type Edge, type Vertex } from '../model'

export interface StoreStats {
  vertices: number
  edges: number
}

export class EdgeListStore<V, E> {
  /** All vertices by element key */
  private vertices = new Map<unknown, Vertex<V>>()

  /** All edges by element key */
  private edges = new Map<unknown, Edge<V, E>>()

  /** Edges leaving each vertex (endpointA): vertexKey -> Set<edgeKey> */
  private outEdges = new Map<unknown, Set<unknown>>()

  /** Edges entering each vertex (endpointB): vertexKey -> Set<edgeKey> */
  private inEdges = new Map<unknown, Set<unknown>>()

  // ===========================================================================
  // VERTEX OPERATIONS
  // ===========================================================================

  hasVertex(key: unknown): boolean {
    return this.vertices.has(key)
  }

  getVertex(key: unknown): Vertex<V> | undefined {
    return this.vertices.get(key)
  }

  addVertex(vertex: Vertex<V>): void {
    this.vertices.set(vertex.key, vertex)
    this.outEdges.set(vertex.key, new Set())
    this.inEdges.set(vertex.key, new Set())
  }

  /**
   * Delete a vertex and every edge touching it. Returns the removed edges.
   */
  deleteVertex(key: unknown): Edge<V, E>[] {
    const removed = this.touching(key)
    for (const edge of removed) {
      this.deleteEdge(edge.key)
    }

    this.outEdges.delete(key)
    this.inEdges.delete(key)
    this.vertices.delete(key)
    return removed
  }

  /**
   * Put `next` in place of the vertex stored under `previousKey`, keeping its
   * position in iteration order, and point every edge touching it at `next`.
   * Returns the rewired edges.
   */
  replaceVertex(previousKey: unknown, next: Vertex<V>): Edge<V, E>[] {
    const previous = this.vertices.get(previousKey)
    if (!previous) return []

    const rewired = this.touching(previousKey).map((edge) => rewireEdge(edge, previous, next))
    this.vertices = renameEntry(this.vertices, previousKey, next.key, next)
    this.outEdges = renameEntry(this.outEdges, previousKey, next.key, this.outEdges.get(previousKey) ?? new Set())
    this.inEdges = renameEntry(this.inEdges, previousKey, next.key, this.inEdges.get(previousKey) ?? new Set())

    for (const edge of rewired) {
      this.edges.set(edge.key, edge)
    }
    return rewired
  }

  getAllVertices(): Vertex<V>[] {
    return Array.from(this.vertices.values())
  }

  // ===========================================================================
  // EDGE OPERATIONS
  // ===========================================================================

  hasEdge(key: unknown): boolean {
    return this.edges.has(key)
  }

  getEdge(key: unknown): Edge<V, E> | undefined {
    return this.edges.get(key)
  }

  addEdge(edge: Edge<V, E>): void {
    this.edges.set(edge.key, edge)
    this.outEdges.get(edge.endpointA.key)?.add(edge.key)
    this.inEdges.get(edge.endpointB.key)?.add(edge.key)
  }

  deleteEdge(key: unknown): Edge<V, E> | undefined {
    const edge = this.edges.get(key)
    if (!edge) return undefined

    this.outEdges.get(edge.endpointA.key)?.delete(key)
    this.inEdges.get(edge.endpointB.key)?.delete(key)
    this.edges.delete(key)
    return edge
  }

  /**
   * Put `next` in place of the edge stored under `previousKey`, keeping its
   * position in iteration order.
   */
  replaceEdge(previousKey: unknown, next: Edge<V, E>): void {
    this.edges = renameEntry(this.edges, previousKey, next.key, next)
    renameMember(this.outEdges.get(next.endpointA.key), previousKey, next.key)
    renameMember(this.inEdges.get(next.endpointB.key), previousKey, next.key)
  }

  getAllEdges(): Edge<V, E>[] {
    return Array.from(this.edges.values())
  }

  /**
   * Edges whose source (endpointA) is the vertex.
   */
  outgoing(vertexKey: unknown): Edge<V, E>[] {
    return this.collect(this.outEdges.get(vertexKey))
  }

  /**
   * Edges whose target (endpointB) is the vertex.
   */
  incoming(vertexKey: unknown): Edge<V, E>[] {
    return this.collect(this.inEdges.get(vertexKey))
  }

  /**
   * Edges touching the vertex at either end, in creation order, loops once.
   */
  touching(vertexKey: unknown): Edge<V, E>[] {
    const keys = new Set<unknown>(this.outEdges.get(vertexKey))
    for (const key of this.inEdges.get(vertexKey) ?? []) {
      keys.add(key)
    }
    return this.collect(keys).sort((a, b) => a.handle.slot - b.handle.slot)
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  clear(): void {
    this.vertices.clear()
    this.edges.clear()
    this.outEdges.clear()
    this.inEdges.clear()
  }

  stats(): StoreStats {
    return {
      vertices: this.vertices.size,
      edges: this.edges.size,
    }
  }

  private collect(keys: Iterable<unknown> | undefined): Edge<V, E>[] {
    if (!keys) return []
    const result: Edge<V, E>[] = []
    for (const key of keys) {
      const edge = this.edges.get(key)
      if (edge) result.push(edge)
    }
    return result
  }
}

/**
 * Copy of `map` with the entry under `previousKey` moved to `nextKey` in place.
 */
function renameEntry<T>(map: Map<unknown, T>, previousKey: unknown, nextKey: unknown, value: T): Map<unknown, T> {
  const result = new Map<unknown, T>()
  for (const [key, current] of map) {
    if (sameKey(key, previousKey)) {
      result.set(nextKey, value)
    } else {
      result.set(key, current)
    }
  }
  return result
}

function renameMember(set: Set<unknown> | undefined, previousKey: unknown, nextKey: unknown): void {
  if (!set || !set.has(previousKey)) return
  const members = Array.from(set, (key) => (sameKey(key, previousKey) ? nextKey : key))
  set.clear()
  for (const key of members) {
    set.add(key)
  }
}
