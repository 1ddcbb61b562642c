/**
 * Graph ADT Interfaces
 */

import type { Edge, EdgeProperties, Vertex } from '../model'
import type { Path } from '../path'
import type { SearchableGraph } from '../search'

/**
 * A vertex handle, or the element stored at the vertex.
 */
export type VertexRef<V> = Vertex<V> | V

/**
 * An edge handle, or the element stored at the edge.
 */
export type EdgeRef<V, E> = Edge<V, E> | E

export interface GraphStats {
  vertices: number
  edges: number
  directed: boolean
}

/**
 * A graph made of vertices and the edges connecting them. Vertex and edge
 * elements are unique within a graph.
 *
 * Methods taking a `VertexRef`/`EdgeRef` throw `InvalidVertexError` /
 * `InvalidEdgeError` when the reference is null, belongs to another graph, or
 * names an element the graph does not hold.
 */
export interface Graph<V, E> extends SearchableGraph<V, E> {
  readonly directed: boolean

  numVertices(): number
  numEdges(): number
  vertices(): Vertex<V>[]
  edges(): Edge<V, E>[]

  hasVertex(ref: VertexRef<V>): boolean
  hasEdge(ref: EdgeRef<V, E>): boolean

  /** Vertex holding `element`, if any */
  vertex(element: V): Vertex<V> | undefined
  /** Edge holding `element`, if any */
  getEdge(element: E): Edge<V, E> | undefined

  /**
   * @throws DuplicateVertexError if a vertex already holds `element`
   */
  insertVertex(element: V): Vertex<V>

  /**
   * Connect two vertices. Without `weight`, the graph's weight extractor is
   * asked once for the weight of `element`.
   *
   * @throws DuplicateEdgeError if an edge already holds `element`
   * @throws InvalidVertexError if an endpoint is invalid
   */
  insertEdge(
    u: VertexRef<V>,
    v: VertexRef<V>,
    element: E,
    weight?: number,
    properties?: EdgeProperties,
  ): Edge<V, E>

  /**
   * Remove a vertex together with every edge touching it.
   * @returns the removed element
   */
  removeVertex(ref: VertexRef<V>): V

  /**
   * @returns the removed element
   */
  removeEdge(edge: EdgeRef<V, E>): E
  /**
   * Remove the first edge connecting `u` and `v`.
   * @returns the removed element, or undefined when no such edge exists
   */
  removeEdge(u: VertexRef<V>, v: VertexRef<V>): E | undefined

  /**
   * Store `element` in place of the vertex's element. The vertex gets a new
   * handle and every edge touching it is rewired to that handle.
   *
   * @throws DuplicateVertexError if a vertex already holds `element`
   * @returns the previous element
   */
  replace(vertex: Vertex<V>, element: V): V
  /**
   * Store `element` in place of the edge's element, keeping endpoints,
   * weight, direction and properties.
   *
   * @throws DuplicateEdgeError if an edge already holds `element`
   * @returns the previous element
   */
  replace(edge: Edge<V, E>, element: E): E
  replaceVertex(ref: VertexRef<V>, element: V): V
  replaceEdge(ref: EdgeRef<V, E>, element: E): E

  areAdjacent(u: VertexRef<V>, v: VertexRef<V>): boolean
  incidentEdges(ref: VertexRef<V>): Edge<V, E>[]

  /**
   * The endpoint of `edge` opposite to `vertex`, or undefined if `edge` does not touch it.
   */
  opposite(vertex: VertexRef<V>, edge: EdgeRef<V, E>): Vertex<V> | undefined

  /**
   * Lightest edge from `a` to `b`; the earliest inserted wins among equal weights.
   */
  edge(a: VertexRef<V>, b: VertexRef<V>): Edge<V, E> | undefined

  pathFrom(ref: VertexRef<V>): Path<V, E>

  /**
   * Minimum-distance simple path, or undefined when `destination` is unreachable.
   * @throws InvalidVertexError if either vertex is not in the graph
   */
  dijkstra(source: VertexRef<V>, destination: VertexRef<V>): Path<V, E> | undefined

  /**
   * Run `fn` once every earlier `exclusive` call on this graph has settled.
   */
  exclusive<T>(fn: () => T | Promise<T>): Promise<T>

  stats(): GraphStats
  clear(): void
}

/**
 * A graph whose edges have a direction, from `endpointA` (outbound vertex) to
 * `endpointB` (inbound vertex).
 *
 * `incidentEdges(v)` returns the edges entering `v` and `outboundEdges(v)` the
 * edges leaving it. Apart from self-loops, which appear in both, the two are
 * disjoint and together hold every edge touching `v`.
 */
export interface Digraph<V, E> extends Graph<V, E> {
  /** Edges whose inbound vertex is `ref` */
  incidentEdges(ref: VertexRef<V>): Edge<V, E>[]
  /** Same as `incidentEdges` */
  inboundEdges(ref: VertexRef<V>): Edge<V, E>[]
  /** Edges whose outbound vertex is `ref` */
  outboundEdges(ref: VertexRef<V>): Edge<V, E>[]
}
